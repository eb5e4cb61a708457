/**
 * AWS Rekognition Face Detection Service
 *
 * Runs DetectFaces against the stored object (no re-upload) and converts
 * Rekognition's emotion confidences and relative bounding boxes into
 * likelihood levels and pixel polygons.
 */

import {
    RekognitionClient,
    DetectFacesCommand,
    type FaceDetail,
    type EmotionName,
} from '@aws-sdk/client-rekognition';
import type {
    IFaceDetectionService,
    FaceDetectionRequest,
    FaceDetectionResponse,
    ImageReference,
} from '../interfaces/face-detection.interface.js';
import type { IStorageService } from '../interfaces/storage.interface.js';
import { polygonFromBox, type FaceAnnotation, type Likelihood } from '../../types/emotion.js';
import { imageService } from '../image.service.js';

interface ImageSize {
    width: number;
    height: number;
}

/**
 * Map a 0-100 confidence to a likelihood level.
 * An emotion Rekognition did not report is UNKNOWN.
 */
export function likelihoodFromConfidence(confidence: number | undefined): Likelihood {
    if (confidence === undefined) return 'UNKNOWN';
    if (confidence >= 90) return 'VERY_LIKELY';
    if (confidence >= 70) return 'LIKELY';
    if (confidence >= 50) return 'POSSIBLE';
    if (confidence >= 25) return 'UNLIKELY';
    return 'VERY_UNLIKELY';
}

export function toFaceAnnotation(detail: FaceDetail, size: ImageSize): FaceAnnotation {
    const confidenceOf = (type: EmotionName) =>
        detail.Emotions?.find((emotion) => emotion.Type === type)?.Confidence;

    const box = detail.BoundingBox;

    return {
        joyLikelihood: likelihoodFromConfidence(confidenceOf('HAPPY')),
        angerLikelihood: likelihoodFromConfidence(confidenceOf('ANGRY')),
        surpriseLikelihood: likelihoodFromConfidence(confidenceOf('SURPRISED')),
        sorrowLikelihood: likelihoodFromConfidence(confidenceOf('SAD')),
        // Rekognition reports no headwear attribute
        headwearLikelihood: 'UNKNOWN',
        boundingPoly: polygonFromBox({
            left: (box?.Left || 0) * size.width,
            top: (box?.Top || 0) * size.height,
            width: (box?.Width || 0) * size.width,
            height: (box?.Height || 0) * size.height,
        }),
    };
}

export class RekognitionFaceDetectionService implements IFaceDetectionService {
    private client: Pick<RekognitionClient, 'send'>;
    private storage: IStorageService;

    constructor(client: Pick<RekognitionClient, 'send'>, storage: IStorageService) {
        this.client = client;
        this.storage = storage;
    }

    getProviderName(): string {
        return 'AWS Rekognition';
    }

    async detectFaces(requests: FaceDetectionRequest[]): Promise<FaceDetectionResponse[]> {
        const responses: FaceDetectionResponse[] = [];
        for (const request of requests) {
            responses.push(await this.detect(request));
        }
        return responses;
    }

    private async detect(request: FaceDetectionRequest): Promise<FaceDetectionResponse> {
        const { image } = request;

        try {
            console.log(`[FACE] Detecting faces in ${image.uri}`);
            const response = await this.client.send(new DetectFacesCommand({
                Image: { S3Object: { Bucket: image.bucket, Name: image.key } },
                Attributes: ['ALL'],
            }));

            const details = (response.FaceDetails || []).slice(0, request.maxResults);
            console.log(`[FACE] Rekognition found ${details.length} face(s) in ${image.uri}`);
            if (details.length === 0) {
                return { faceAnnotations: [] };
            }

            const size = await this.getImageSize(image);
            return { faceAnnotations: details.map((detail) => toFaceAnnotation(detail, size)) };
        } catch (error) {
            console.error(`[FACE] Face detection failed for ${image.uri}:`, error);
            return {
                faceAnnotations: [],
                error: { message: error instanceof Error ? error.message : String(error) },
            };
        }
    }

    // Rekognition boxes are ratios of the image size
    private async getImageSize(image: ImageReference): Promise<ImageSize> {
        const buffer = await this.storage.download(image.bucket, image.key);
        if (!buffer) {
            throw new Error(`Image ${image.uri} disappeared during face detection`);
        }
        const { width, height } = await imageService.getMetadata(buffer);
        return { width, height };
    }
}

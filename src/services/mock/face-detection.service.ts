/**
 * Mock Face Detection Service
 *
 * Deterministic face detection for testing UI flows and local development.
 * Uses words in the object name to simulate faces and expressions.
 * Words are split on anything but letters and digits, so "joy-face.png"
 * reads as joy, face, png and "chat.png" has no "hat".
 *
 * DETERMINISTIC RULES:
 * - "noface" in the name: no faces
 * - "error" in the name: provider error
 * - "group" in the name: three faces side by side (joy, surprise, sorrow)
 * - "joy", "anger", "surprise", "sorrow": one face with that emotion VERY_LIKELY
 * - "hat": headwear VERY_LIKELY
 * - Default: one neutral face in the middle of the image
 */

import type {
    IFaceDetectionService,
    FaceDetectionRequest,
    FaceDetectionResponse,
} from '../interfaces/face-detection.interface.js';
import type { IStorageService } from '../interfaces/storage.interface.js';
import { polygonFromBox, type FaceAnnotation, type Likelihood, type PixelBox } from '../../types/emotion.js';
import { imageService } from '../image.service.js';

type Emotion = 'joy' | 'anger' | 'surprise' | 'sorrow';

const EMOTION_PATTERNS: readonly Emotion[] = ['joy', 'anger', 'surprise', 'sorrow'];
const GROUP_EMOTIONS: readonly Emotion[] = ['joy', 'surprise', 'sorrow'];

function mockAnnotation(box: PixelBox, emotion: Emotion | null, wearsHat: boolean): FaceAnnotation {
    const level = (matches: boolean): Likelihood => (matches ? 'VERY_LIKELY' : 'VERY_UNLIKELY');
    return {
        joyLikelihood: level(emotion === 'joy'),
        angerLikelihood: level(emotion === 'anger'),
        surpriseLikelihood: level(emotion === 'surprise'),
        sorrowLikelihood: level(emotion === 'sorrow'),
        headwearLikelihood: level(wearsHat),
        boundingPoly: polygonFromBox(box),
    };
}

export class MockFaceDetectionService implements IFaceDetectionService {
    private storage: IStorageService;

    constructor(storage: IStorageService) {
        this.storage = storage;
    }

    getProviderName(): string {
        return 'mock';
    }

    async detectFaces(requests: FaceDetectionRequest[]): Promise<FaceDetectionResponse[]> {
        const responses: FaceDetectionResponse[] = [];
        for (const request of requests) {
            responses.push(await this.detect(request));
        }
        return responses;
    }

    private async detect(request: FaceDetectionRequest): Promise<FaceDetectionResponse> {
        const words = new Set(request.image.key.toLowerCase().split(/[^a-z0-9]+/));

        if (words.has('error')) {
            return { faceAnnotations: [], error: { message: `Mock detection failure for ${request.image.uri}` } };
        }
        if (words.has('noface')) {
            return { faceAnnotations: [] };
        }

        const buffer = await this.storage.download(request.image.bucket, request.image.key);
        if (!buffer) {
            return { faceAnnotations: [], error: { message: `Image not found: ${request.image.uri}` } };
        }
        const { width, height } = await imageService.getMetadata(buffer);
        const wearsHat = words.has('hat');

        let faces: FaceAnnotation[];
        if (words.has('group')) {
            // Three faces, each a fifth of the width, spread across the image
            faces = GROUP_EMOTIONS.map((emotion, index) =>
                mockAnnotation(
                    { left: width * (0.1 + index * 0.3), top: height * 0.3, width: width * 0.2, height: height * 0.3 },
                    emotion,
                    wearsHat
                )
            );
        } else {
            const emotion = EMOTION_PATTERNS.find((pattern) => words.has(pattern)) || null;
            faces = [
                mockAnnotation(
                    { left: width * 0.3, top: height * 0.25, width: width * 0.4, height: height * 0.5 },
                    emotion,
                    wearsHat
                ),
            ];
        }

        console.log(`[FACE] Mock detected ${faces.length} face(s) in ${request.image.uri}`);
        return { faceAnnotations: faces.slice(0, request.maxResults) };
    }
}

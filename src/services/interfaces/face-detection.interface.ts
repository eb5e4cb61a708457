/**
 * Face Detection Service Interface
 *
 * Abstracts the face/emotion classifier. Implementations:
 * - MockFaceDetectionService: Deterministic faces derived from the object name
 * - RekognitionFaceDetectionService: AWS Rekognition DetectFaces
 *
 * Images are referenced by their storage location, never re-uploaded.
 */

import type { FaceAnnotation } from '../../types/emotion.js';

export interface ImageReference {
    bucket: string;
    key: string;
    /** Provider URI of the object (e.g. s3://bucket/key) */
    uri: string;
}

export interface FaceDetectionRequest {
    image: ImageReference;
    /** Maximum number of faces to report */
    maxResults: number;
}

export interface FaceDetectionResponse {
    /** Detected faces, in provider order */
    faceAnnotations: FaceAnnotation[];

    /** Set when the provider failed to process this request */
    error?: {
        message: string;
    };
}

export interface IFaceDetectionService {
    /**
     * Run face detection for a batch of images.
     * Returns one response per request, in request order.
     */
    detectFaces(requests: FaceDetectionRequest[]): Promise<FaceDetectionResponse[]>;

    /**
     * Get the provider name for this service
     */
    getProviderName(): string;
}

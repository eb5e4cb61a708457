/**
 * Service Factory
 *
 * Returns appropriate service implementations based on environment.
 * Switch between mock and AWS services via USE_MOCK_SERVICES env var.
 */

import { S3Client } from '@aws-sdk/client-s3';
import { RekognitionClient } from '@aws-sdk/client-rekognition';
import { env } from '../config/env.js';
import type { IStorageService } from './interfaces/storage.interface.js';
import type { IFaceDetectionService } from './interfaces/face-detection.interface.js';
import { MockStorageService } from './mock/storage.service.js';
import { MockFaceDetectionService } from './mock/face-detection.service.js';
import { S3StorageService } from './aws/storage.service.js';
import { RekognitionFaceDetectionService } from './aws/face-detection.service.js';

// Storage service instance
let storageService: IStorageService | null = null;

export function getStorageService(): IStorageService {
    if (!storageService) {
        if (env.USE_MOCK_SERVICES) {
            storageService = new MockStorageService(undefined, `http://localhost:${env.PORT}/uploads`);
            console.log('📦 Using local filesystem for storage');
        } else {
            storageService = new S3StorageService(new S3Client({ region: env.AWS_REGION }), {
                region: env.AWS_REGION,
                cloudfrontDomain: env.CLOUDFRONT_DOMAIN,
            });
            console.log('✅ Using AWS S3 for storage');
        }
    }
    return storageService;
}

// Face detection service instance
let faceDetectionService: IFaceDetectionService | null = null;

export function getFaceDetectionService(): IFaceDetectionService {
    if (!faceDetectionService) {
        if (env.USE_MOCK_SERVICES) {
            faceDetectionService = new MockFaceDetectionService(getStorageService());
            console.log('🎭 Using mock face detection');
        } else {
            faceDetectionService = new RekognitionFaceDetectionService(
                new RekognitionClient({ region: env.AWS_REGION }),
                getStorageService()
            );
            console.log('✅ Using AWS Rekognition for face detection');
        }
    }
    return faceDetectionService;
}

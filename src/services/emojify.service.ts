/**
 * Emojify Service
 *
 * Handles one emojify request end to end:
 * 1. Validate the object name
 * 2. Resolve the configured bucket
 * 3. Resolve the source object and its content type
 * 4. Detect faces (one request, object referenced in place)
 * 5. Draw an emoji over every face
 * 6. Upload the result as a public object
 *
 * Every failure is caught here and returned as an error envelope.
 * Nothing is retried.
 */

import {
    EmojifyErrorCode,
    EMOJIFY_ERRORS,
    emojifyError,
    isEmojifyError,
} from '../middleware/error.middleware.js';
import type { IStorageService } from './interfaces/storage.interface.js';
import type { IFaceDetectionService } from './interfaces/face-detection.interface.js';
import type { EmojiAssetTable } from './emoji-assets.service.js';
import type { ImageService } from './image.service.js';

export const MAX_FACE_RESULTS = 100;
export const EMOJIFIED_PREFIX = 'emojified/emojified-';

export interface EmojifySuccess {
    objectPath: string;
    emojifiedUrl: string;
    statusCode: 200;
}

export interface EmojifyFailure {
    statusCode: number;
    errorCode: EmojifyErrorCode;
    errorMessage: string;
}

export type EmojifyResult = EmojifySuccess | EmojifyFailure;

export interface EmojifyDependencies {
    storage: IStorageService;
    faceDetection: IFaceDetectionService;
    imageService: ImageService;
    emojis: EmojiAssetTable;
    /** Bucket holding source and emojified images */
    bucketName?: string;
    /** Draw the hat emoji over faces wearing headwear */
    hatOverlay?: boolean;
}

export function isEmojifyFailure(result: EmojifyResult): result is EmojifyFailure {
    return 'errorCode' in result;
}

/**
 * Image subtype from a MIME type: "image/jpeg; q=1" -> "jpeg".
 * A type without "/" is returned whole.
 */
export function imageSubtype(contentType: string): string {
    const mimeType = contentType.split(';')[0] ?? '';
    return mimeType.slice(mimeType.indexOf('/') + 1).trim().toLowerCase();
}

export class EmojifyService {
    private readonly deps: EmojifyDependencies;

    constructor(deps: EmojifyDependencies) {
        this.deps = deps;
    }

    async execute(objectName: string): Promise<EmojifyResult> {
        try {
            return await this.emojify(objectName);
        } catch (error) {
            return this.toFailure(error);
        }
    }

    private async emojify(objectName: string): Promise<EmojifySuccess> {
        const { storage, faceDetection, imageService, emojis, bucketName } = this.deps;

        if (!objectName) throw emojifyError(EmojifyErrorCode.ObjectNameMissing);
        if (objectName.includes('/')) throw emojifyError(EmojifyErrorCode.SlashesForbidden);

        if (!bucketName || !(await storage.bucketExists(bucketName))) {
            throw emojifyError(EmojifyErrorCode.BucketMisconfigured);
        }

        const blob = await storage.getMetadata(bucketName, objectName);
        if (!blob) throw emojifyError(EmojifyErrorCode.BlobNotFound);

        const imageType = blob.contentType ? imageSubtype(blob.contentType) : '';
        if (!imageType) throw emojifyError(EmojifyErrorCode.ContentTypeMissing);

        console.log(`[EMOJIFY] Detecting faces in ${bucketName}/${objectName} (${blob.contentType})`);

        const responses = await faceDetection.detectFaces([
            {
                image: {
                    bucket: bucketName,
                    key: objectName,
                    uri: storage.getObjectUri(bucketName, objectName),
                },
                maxResults: MAX_FACE_RESULTS,
            },
        ]);
        const [response] = responses;
        if (responses.length !== 1 || !response) {
            throw emojifyError(EmojifyErrorCode.ResponseCountMismatch);
        }
        if (response.error) {
            throw emojifyError(EmojifyErrorCode.Other, response.error.message);
        }
        if (response.faceAnnotations.length === 0) {
            throw emojifyError(EmojifyErrorCode.NoFacesDetected);
        }

        const source = await storage.download(bucketName, objectName);
        if (!source) throw emojifyError(EmojifyErrorCode.BlobNotFound);

        const emojified = await imageService.composite(source, response.faceAnnotations, emojis, {
            format: imageType,
            hatOverlay: this.deps.hatOverlay,
        });

        const objectPath = `${EMOJIFIED_PREFIX}${objectName}`;
        const upload = await storage.upload(bucketName, objectPath, emojified, {
            contentType: blob.contentType,
            acl: 'public-read',
        });

        console.log(`[EMOJIFY] Emojified ${response.faceAnnotations.length} face(s) into ${upload.url}`);

        return {
            objectPath,
            emojifiedUrl: upload.url,
            statusCode: 200,
        };
    }

    private toFailure(error: unknown): EmojifyFailure {
        const failure: EmojifyFailure = isEmojifyError(error)
            ? { statusCode: error.statusCode, errorCode: error.errorCode, errorMessage: error.message }
            : {
                statusCode: EMOJIFY_ERRORS[EmojifyErrorCode.Other].statusCode,
                errorCode: EmojifyErrorCode.Other,
                errorMessage: (error instanceof Error && error.message) || EMOJIFY_ERRORS[EmojifyErrorCode.Other].message,
            };

        console.error(`[EMOJIFY] Error ${failure.errorCode}: ${failure.errorMessage}`);
        return failure;
    }
}

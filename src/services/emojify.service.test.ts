import { afterEach, beforeAll, beforeEach, describe, expect, it, vi } from 'vitest';
import sharp from 'sharp';
import {
    FakeFaceDetectionService,
    InMemoryStorageService,
    WHITE,
    faceAnnotation,
    solidEmojiTable,
    solidImage,
} from '../test-utils/fakes.js';
import { EmojifyErrorCode } from '../middleware/error.middleware.js';
import type { EmojiAssetTable } from './emoji-assets.service.js';
import { EmojifyService, imageSubtype, isEmojifyFailure, type EmojifyDependencies } from './emojify.service.js';
import { ImageService } from './image.service.js';

const BUCKET = 'test-bucket';

describe('EmojifyService', () => {
    let emojis: EmojiAssetTable;
    let jpeg: Buffer;
    let storage: InMemoryStorageService;
    let imageService: ImageService;

    const createService = (overrides: Partial<EmojifyDependencies> = {}) =>
        new EmojifyService({
            storage,
            faceDetection: FakeFaceDetectionService.returning([faceAnnotation({ joyLikelihood: 'VERY_LIKELY' })]),
            imageService,
            emojis,
            bucketName: BUCKET,
            ...overrides,
        });

    beforeAll(async () => {
        emojis = await solidEmojiTable();
        jpeg = await solidImage(100, 100, WHITE, 'jpeg');
    });

    beforeEach(() => {
        vi.spyOn(console, 'log').mockImplementation(() => {});
        vi.spyOn(console, 'error').mockImplementation(() => {});
        storage = new InMemoryStorageService().addBucket(BUCKET).putObject(BUCKET, 'face.jpg', jpeg, 'image/jpeg');
        imageService = new ImageService();
    });

    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('emojifies the image and publishes it under the emojified prefix', async () => {
        const faceDetection = FakeFaceDetectionService.returning([faceAnnotation({ joyLikelihood: 'VERY_LIKELY' })]);
        const composite = vi.spyOn(imageService, 'composite');

        const result = await createService({ faceDetection }).execute('face.jpg');

        expect(result).toEqual({
            objectPath: 'emojified/emojified-face.jpg',
            emojifiedUrl: 'https://storage.test/test-bucket/emojified/emojified-face.jpg',
            statusCode: 200,
        });

        expect(faceDetection.calls).toEqual([
            [{ image: { bucket: BUCKET, key: 'face.jpg', uri: 'mem://test-bucket/face.jpg' }, maxResults: 100 }],
        ]);
        expect(composite).toHaveBeenCalledWith(jpeg, [faceAnnotation({ joyLikelihood: 'VERY_LIKELY' })], emojis, {
            format: 'jpeg',
            hatOverlay: undefined,
        });

        expect(storage.uploads).toHaveLength(1);
        const [upload] = storage.uploads;
        expect(upload.bucket).toBe(BUCKET);
        expect(upload.key).toBe('emojified/emojified-face.jpg');
        expect(upload.options).toEqual({ contentType: 'image/jpeg', acl: 'public-read' });
        expect(await sharp(upload.buffer).metadata()).toMatchObject({ format: 'jpeg', width: 100, height: 100 });
    });

    it('passes the hat overlay setting to the compositor', async () => {
        const composite = vi.spyOn(imageService, 'composite');

        await createService({ hatOverlay: true }).execute('face.jpg');

        expect(composite.mock.calls[0][3]).toEqual({ format: 'jpeg', hatOverlay: true });
    });

    it('emojifies AVIF sources and keeps their content type', async () => {
        const avif = await sharp(jpeg).avif().toBuffer();
        storage.putObject(BUCKET, 'face.avif', avif, 'image/avif');

        const result = await createService().execute('face.avif');

        expect(result).toMatchObject({ objectPath: 'emojified/emojified-face.avif', statusCode: 200 });
        expect(storage.uploads[0].options.contentType).toBe('image/avif');
        expect(await sharp(storage.uploads[0].buffer).metadata()).toMatchObject({ format: 'heif', compression: 'av1' });
    });

    it('returns the URL the storage reported for the upload', async () => {
        vi.spyOn(storage, 'upload').mockResolvedValue({
            key: 'emojified/emojified-face.jpg',
            url: 'https://cdn.test/emojified/emojified-face.jpg',
            bucket: BUCKET,
        });

        expect(await createService().execute('face.jpg')).toMatchObject({
            emojifiedUrl: 'https://cdn.test/emojified/emojified-face.jpg',
        });
    });

    it('rejects an empty object name', async () => {
        expect(await createService().execute('')).toEqual({
            statusCode: 400,
            errorCode: 106,
            errorMessage: 'objectName is null.',
        });
        expect(console.error).toHaveBeenCalledWith('[EMOJIFY] Error 106: objectName is null.');
    });

    it('rejects object names containing slashes', async () => {
        expect(await createService().execute('a/b')).toEqual({
            statusCode: 400,
            errorCode: 101,
            errorMessage: 'Slashes are intentionally forbidden in objectName.',
        });
    });

    it('fails with 102 when no bucket is configured', async () => {
        const result = await createService({ bucketName: undefined }).execute('face.jpg');

        expect(result).toMatchObject({ statusCode: 500, errorCode: EmojifyErrorCode.BucketMisconfigured });
    });

    it('fails with 102 when the configured bucket does not exist', async () => {
        const result = await createService({ bucketName: 'other-bucket' }).execute('face.jpg');

        expect(result).toEqual({
            statusCode: 500,
            errorCode: 102,
            errorMessage: 'STORAGE_BUCKET_NAME is missing or names a bucket that does not exist.',
        });
    });

    it('fails with 103 when the object does not exist', async () => {
        expect(await createService().execute('nonexistent.png')).toEqual({
            statusCode: 400,
            errorCode: 103,
            errorMessage: "Blob specified doesn't exist in bucket.",
        });
    });

    it('fails with 104 when the object has no content type', async () => {
        storage.putObject(BUCKET, 'untyped', jpeg, null);

        expect(await createService().execute('untyped')).toEqual({
            statusCode: 400,
            errorCode: 104,
            errorMessage: 'blob ContentType is null.',
        });
    });

    it.each([0, 2])('fails with 105 when the detector returns %i responses', async (count) => {
        const faceDetection = new FakeFaceDetectionService(() =>
            Array.from({ length: count }, () => ({ faceAnnotations: [faceAnnotation()] }))
        );

        expect(await createService({ faceDetection }).execute('face.jpg')).toEqual({
            statusCode: 500,
            errorCode: 105,
            errorMessage: 'Size of responses list is not 1.',
        });
    });

    it('surfaces provider errors as 100', async () => {
        const faceDetection = new FakeFaceDetectionService(() => [
            { faceAnnotations: [], error: { message: 'Quota exceeded' } },
        ]);

        expect(await createService({ faceDetection }).execute('face.jpg')).toEqual({
            statusCode: 500,
            errorCode: 100,
            errorMessage: 'Quota exceeded',
        });
        expect(storage.uploads).toEqual([]);
    });

    it('fails with 107 when no faces are detected', async () => {
        const faceDetection = FakeFaceDetectionService.returning([]);

        expect(await createService({ faceDetection }).execute('face.jpg')).toEqual({
            statusCode: 400,
            errorCode: 107,
            errorMessage: "We couldn't detect faces in your image.",
        });
        expect(storage.uploads).toEqual([]);
    });

    it('maps unexpected provider faults to 100 with their message', async () => {
        vi.spyOn(storage, 'getMetadata').mockRejectedValue(new Error('socket hang up'));

        expect(await createService().execute('face.jpg')).toEqual({
            statusCode: 500,
            errorCode: 100,
            errorMessage: 'socket hang up',
        });
    });

    it('maps encoding failures to 100', async () => {
        storage.putObject(BUCKET, 'vector.svg', jpeg, 'image/svg+xml');

        expect(await createService().execute('vector.svg')).toEqual({
            statusCode: 500,
            errorCode: 100,
            errorMessage: 'Unsupported output image type: svg+xml',
        });
    });
});

describe('imageSubtype', () => {
    it.each([
        ['image/jpeg', 'jpeg'],
        ['image/PNG', 'png'],
        ['image/webp; charset=binary', 'webp'],
        ['png', 'png'],
        ['image/', ''],
    ])('%s -> %s', (contentType, expected) => {
        expect(imageSubtype(contentType)).toBe(expected);
    });
});

describe('isEmojifyFailure', () => {
    it('tells failures from successes', () => {
        expect(isEmojifyFailure({ statusCode: 400, errorCode: 106, errorMessage: 'objectName is null.' })).toBe(true);
        expect(isEmojifyFailure({ objectPath: 'emojified/emojified-a.png', emojifiedUrl: 'https://x', statusCode: 200 })).toBe(false);
    });
});

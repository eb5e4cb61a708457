/**
 * In-process stand-ins for the storage and face detection providers,
 * plus helpers for building and inspecting test images.
 */

import sharp from 'sharp';
import type {
    BlobMetadata,
    IStorageService,
    UploadOptions,
    UploadResult,
} from '../services/interfaces/storage.interface.js';
import type {
    FaceDetectionRequest,
    FaceDetectionResponse,
    IFaceDetectionService,
} from '../services/interfaces/face-detection.interface.js';
import type { EmojiAssetTable } from '../services/emoji-assets.service.js';
import type { EmotionCategory, FaceAnnotation } from '../types/emotion.js';

export type Rgb = readonly [number, number, number];

interface StoredObject {
    buffer: Buffer;
    contentType: string | null;
}

export class InMemoryStorageService implements IStorageService {
    private buckets = new Map<string, Map<string, StoredObject>>();
    readonly uploads: Array<{ bucket: string; key: string; buffer: Buffer; options: UploadOptions }> = [];

    addBucket(bucket: string): this {
        this.buckets.set(bucket, new Map());
        return this;
    }

    putObject(bucket: string, key: string, buffer: Buffer, contentType: string | null): this {
        const objects = this.buckets.get(bucket);
        if (!objects) throw new Error(`No bucket ${bucket}`);
        objects.set(key, { buffer, contentType });
        return this;
    }

    getProviderName(): string {
        return 'in-memory';
    }

    async bucketExists(bucket: string): Promise<boolean> {
        return this.buckets.has(bucket);
    }

    async getMetadata(bucket: string, key: string): Promise<BlobMetadata | null> {
        const object = this.buckets.get(bucket)?.get(key);
        if (!object) return null;
        return { name: key, contentType: object.contentType, size: object.buffer.length };
    }

    async download(bucket: string, key: string): Promise<Buffer | null> {
        return this.buckets.get(bucket)?.get(key)?.buffer ?? null;
    }

    async upload(bucket: string, key: string, buffer: Buffer, options: UploadOptions = {}): Promise<UploadResult> {
        this.uploads.push({ bucket, key, buffer, options });
        this.putObject(bucket, key, buffer, options.contentType ?? null);
        return { key, url: this.getPublicUrl(bucket, key), bucket };
    }

    getPublicUrl(bucket: string, key: string): string {
        return `https://storage.test/${bucket}/${key}`;
    }

    getObjectUri(bucket: string, key: string): string {
        return `mem://${bucket}/${key}`;
    }
}

export class FakeFaceDetectionService implements IFaceDetectionService {
    readonly calls: FaceDetectionRequest[][] = [];
    private respond: (requests: FaceDetectionRequest[]) => FaceDetectionResponse[];

    constructor(respond: (requests: FaceDetectionRequest[]) => FaceDetectionResponse[]) {
        this.respond = respond;
    }

    /** Answers every request with the same faces */
    static returning(faceAnnotations: FaceAnnotation[]): FakeFaceDetectionService {
        return new FakeFaceDetectionService((requests) => requests.map(() => ({ faceAnnotations })));
    }

    getProviderName(): string {
        return 'fake';
    }

    async detectFaces(requests: FaceDetectionRequest[]): Promise<FaceDetectionResponse[]> {
        this.calls.push(requests);
        return this.respond(requests);
    }
}

/**
 * A face at (10,10)-(50,60) with every axis VERY_UNLIKELY unless overridden.
 */
export function faceAnnotation(overrides: Partial<FaceAnnotation> = {}): FaceAnnotation {
    return {
        joyLikelihood: 'VERY_UNLIKELY',
        angerLikelihood: 'VERY_UNLIKELY',
        surpriseLikelihood: 'VERY_UNLIKELY',
        sorrowLikelihood: 'VERY_UNLIKELY',
        headwearLikelihood: 'VERY_UNLIKELY',
        boundingPoly: [
            { x: 10, y: 10 },
            { x: 50, y: 10 },
            { x: 50, y: 60 },
            { x: 10, y: 60 },
        ],
        ...overrides,
    };
}

export const WHITE: Rgb = [255, 255, 255];

export const EMOJI_COLORS: Readonly<Record<EmotionCategory, Rgb>> = {
    joy: [255, 0, 0],
    anger: [0, 0, 255],
    surprise: [0, 255, 0],
    sorrow: [255, 255, 0],
    hat: [255, 0, 255],
    none: [0, 255, 255],
};

export async function solidImage(
    width: number,
    height: number,
    [r, g, b]: Rgb,
    format: 'png' | 'jpeg' = 'png'
): Promise<Buffer> {
    return sharp({ create: { width, height, channels: 3, background: { r, g, b } } })
        .toFormat(format)
        .toBuffer();
}

/** Emoji table where every category is a 10x10 square of its own color */
export async function solidEmojiTable(): Promise<EmojiAssetTable> {
    const square = (category: EmotionCategory) => solidImage(10, 10, EMOJI_COLORS[category]);
    const [joy, anger, surprise, sorrow, hat, none] = await Promise.all([
        square('joy'),
        square('anger'),
        square('surprise'),
        square('sorrow'),
        square('hat'),
        square('none'),
    ]);
    return { joy, anger, surprise, sorrow, hat, none };
}

export async function pixelAt(image: Buffer, x: number, y: number): Promise<Rgb> {
    const { data, info } = await sharp(image).raw().toBuffer({ resolveWithObject: true });
    const offset = (y * info.width + x) * info.channels;
    return [data[offset], data[offset + 1], data[offset + 2]];
}

/** Largest per-channel difference between two colors */
export function colorDistance(a: Rgb, b: Rgb): number {
    return Math.max(Math.abs(a[0] - b[0]), Math.abs(a[1] - b[1]), Math.abs(a[2] - b[2]));
}

/**
 * Mock Storage Service
 *
 * Local filesystem implementation for development.
 * Each bucket is a folder under /uploads, served directly by Express.
 * Content types are derived from the file extension; unknown extensions
 * have none.
 */

import fs from 'fs/promises';
import path from 'path';
import { pathToFileURL } from 'url';
import type {
    IStorageService,
    BlobMetadata,
    UploadOptions,
    UploadResult,
} from '../interfaces/storage.interface.js';

export const UPLOADS_DIR = path.join(process.cwd(), 'uploads');

const CONTENT_TYPES: Readonly<Record<string, string>> = {
    '.jpg': 'image/jpeg',
    '.jpeg': 'image/jpeg',
    '.png': 'image/png',
    '.gif': 'image/gif',
    '.webp': 'image/webp',
    '.tif': 'image/tiff',
    '.tiff': 'image/tiff',
    '.avif': 'image/avif',
};

function isMissingFile(error: unknown): boolean {
    return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export class MockStorageService implements IStorageService {
    private rootDir: string;
    private baseUrl: string;

    constructor(rootDir: string = UPLOADS_DIR, baseUrl = `http://localhost:${process.env.PORT || 3001}/uploads`) {
        this.rootDir = rootDir;
        this.baseUrl = baseUrl;
    }

    getProviderName(): string {
        return 'mock';
    }

    /**
     * Create the folder backing a bucket
     */
    async ensureBucket(bucket: string): Promise<void> {
        await fs.mkdir(path.join(this.rootDir, bucket), { recursive: true });
    }

    async bucketExists(bucket: string): Promise<boolean> {
        try {
            const stats = await fs.stat(path.join(this.rootDir, bucket));
            return stats.isDirectory();
        } catch (error) {
            if (isMissingFile(error)) return false;
            throw error;
        }
    }

    async getMetadata(bucket: string, key: string): Promise<BlobMetadata | null> {
        try {
            const stats = await fs.stat(this.resolvePath(bucket, key));
            if (!stats.isFile()) return null;
            return {
                name: key,
                contentType: CONTENT_TYPES[path.extname(key).toLowerCase()] || null,
                size: stats.size,
            };
        } catch (error) {
            if (isMissingFile(error)) return null;
            throw error;
        }
    }

    async download(bucket: string, key: string): Promise<Buffer | null> {
        try {
            return await fs.readFile(this.resolvePath(bucket, key));
        } catch (error) {
            if (isMissingFile(error)) return null;
            throw error;
        }
    }

    async upload(bucket: string, key: string, buffer: Buffer, options: UploadOptions = {}): Promise<UploadResult> {
        const filePath = this.resolvePath(bucket, key);

        // Objects are always publicly served in mock mode, so the ACL is not stored
        await fs.mkdir(path.dirname(filePath), { recursive: true });
        await fs.writeFile(filePath, buffer);

        console.log(`[STORAGE] Wrote ${filePath} (${buffer.length} bytes, acl: ${options.acl || 'default'})`);

        return {
            key,
            url: this.getPublicUrl(bucket, key),
            bucket,
        };
    }

    getPublicUrl(bucket: string, key: string): string {
        return `${this.baseUrl}/${bucket}/${key}`;
    }

    getObjectUri(bucket: string, key: string): string {
        return pathToFileURL(this.resolvePath(bucket, key)).href;
    }

    private resolvePath(bucket: string, key: string): string {
        const bucketDir = path.resolve(this.rootDir, bucket);
        const filePath = path.resolve(bucketDir, key);
        if (!filePath.startsWith(bucketDir + path.sep)) {
            throw new Error(`Object key escapes bucket: ${key}`);
        }
        return filePath;
    }
}

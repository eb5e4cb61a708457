/**
 * AWS S3 Storage Service
 */

import {
    S3Client,
    S3ServiceException,
    HeadBucketCommand,
    HeadObjectCommand,
    GetObjectCommand,
    PutObjectCommand,
} from '@aws-sdk/client-s3';
import type {
    IStorageService,
    BlobMetadata,
    UploadOptions,
    UploadResult,
} from '../interfaces/storage.interface.js';

export interface S3StorageOptions {
    region: string;
    /** Serve public URLs from this CloudFront domain instead of the bucket endpoint */
    cloudfrontDomain?: string;
}

// HeadObject/HeadBucket report a bare 404 ("NotFound"); GetObject reports NoSuchKey
function isNotFound(error: unknown): boolean {
    if (!(error instanceof S3ServiceException)) return false;
    return (
        error.name === 'NotFound' ||
        error.name === 'NoSuchKey' ||
        error.name === 'NoSuchBucket' ||
        error.$metadata.httpStatusCode === 404
    );
}

export class S3StorageService implements IStorageService {
    private client: Pick<S3Client, 'send'>;
    private region: string;
    private cloudfrontDomain?: string;

    constructor(client: Pick<S3Client, 'send'>, options: S3StorageOptions) {
        this.client = client;
        this.region = options.region;
        this.cloudfrontDomain = options.cloudfrontDomain;
    }

    getProviderName(): string {
        return 'AWS S3';
    }

    async bucketExists(bucket: string): Promise<boolean> {
        try {
            await this.client.send(new HeadBucketCommand({ Bucket: bucket }));
            return true;
        } catch (error) {
            if (isNotFound(error)) return false;
            throw error;
        }
    }

    async getMetadata(bucket: string, key: string): Promise<BlobMetadata | null> {
        try {
            const response = await this.client.send(new HeadObjectCommand({
                Bucket: bucket,
                Key: key,
            }));
            return {
                name: key,
                contentType: response.ContentType || null,
                size: response.ContentLength || 0,
            };
        } catch (error) {
            if (isNotFound(error)) return null;
            throw error;
        }
    }

    async download(bucket: string, key: string): Promise<Buffer | null> {
        try {
            const response = await this.client.send(new GetObjectCommand({
                Bucket: bucket,
                Key: key,
            }));
            if (!response.Body) return null;
            return Buffer.from(await response.Body.transformToByteArray());
        } catch (error) {
            if (isNotFound(error)) return null;
            throw error;
        }
    }

    async upload(bucket: string, key: string, buffer: Buffer, options: UploadOptions = {}): Promise<UploadResult> {
        await this.client.send(new PutObjectCommand({
            Bucket: bucket,
            Key: key,
            Body: buffer,
            ContentType: options.contentType || undefined,
            ACL: options.acl,
        }));

        console.log(`[STORAGE] Uploaded s3://${bucket}/${key} (${buffer.length} bytes, acl: ${options.acl || 'default'})`);

        return {
            key,
            url: this.getPublicUrl(bucket, key),
            bucket,
        };
    }

    getPublicUrl(bucket: string, key: string): string {
        if (this.cloudfrontDomain) {
            return `https://${this.cloudfrontDomain}/${key}`;
        }
        return `https://${bucket}.s3.${this.region}.amazonaws.com/${key}`;
    }

    getObjectUri(bucket: string, key: string): string {
        return `s3://${bucket}/${key}`;
    }
}

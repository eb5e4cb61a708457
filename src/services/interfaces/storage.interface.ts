/**
 * Storage Service Interface
 *
 * Abstracts object storage operations. Implementations:
 * - MockStorageService: Local filesystem buckets for development
 * - S3StorageService: AWS S3 (+ optional CloudFront) for production
 */

/** Canned access control applied to an uploaded object */
export type ObjectAcl = 'private' | 'public-read';

export interface BlobMetadata {
    name: string;
    /** Declared MIME type, null when the object has none */
    contentType: string | null;
    size: number;
}

export interface UploadOptions {
    contentType?: string | null;
    acl?: ObjectAcl;
}

export interface UploadResult {
    key: string;
    url: string;
    bucket: string;
}

export interface IStorageService {
    /**
     * Check that a bucket exists and is reachable
     */
    bucketExists(bucket: string): Promise<boolean>;

    /**
     * Read object metadata
     * @returns null if the object does not exist
     */
    getMetadata(bucket: string, key: string): Promise<BlobMetadata | null>;

    /**
     * Download an object's bytes
     * @returns null if the object does not exist
     */
    download(bucket: string, key: string): Promise<Buffer | null>;

    /**
     * Upload (or overwrite) an object
     */
    upload(bucket: string, key: string, buffer: Buffer, options?: UploadOptions): Promise<UploadResult>;

    /**
     * URL under which a public-read object can be fetched without credentials
     */
    getPublicUrl(bucket: string, key: string): string;

    /**
     * Provider URI used to reference the object from other services (e.g. s3://bucket/key)
     */
    getObjectUri(bucket: string, key: string): string;

    /**
     * Get the provider name for this service
     */
    getProviderName(): string;
}

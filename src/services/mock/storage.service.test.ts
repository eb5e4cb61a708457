import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { pathToFileURL } from 'url';
import { MockStorageService } from './storage.service.js';

describe('MockStorageService', () => {
    let rootDir: string;
    let storage: MockStorageService;

    beforeEach(async () => {
        vi.spyOn(console, 'log').mockImplementation(() => {});
        rootDir = await fs.mkdtemp(path.join(os.tmpdir(), 'mock-storage-'));
        storage = new MockStorageService(rootDir, 'http://localhost:3001/uploads');
    });

    afterEach(async () => {
        vi.restoreAllMocks();
        await fs.rm(rootDir, { recursive: true, force: true });
    });

    it('treats folders as buckets', async () => {
        expect(await storage.bucketExists('photos')).toBe(false);

        await storage.ensureBucket('photos');

        expect(await storage.bucketExists('photos')).toBe(true);
    });

    it('uploads, describes and downloads objects', async () => {
        await storage.ensureBucket('photos');
        const buffer = Buffer.from('not really a png');

        const result = await storage.upload('photos', 'emojified/emojified-face.png', buffer, { acl: 'public-read' });

        expect(result).toEqual({
            key: 'emojified/emojified-face.png',
            url: 'http://localhost:3001/uploads/photos/emojified/emojified-face.png',
            bucket: 'photos',
        });
        expect(await storage.getMetadata('photos', 'emojified/emojified-face.png')).toEqual({
            name: 'emojified/emojified-face.png',
            contentType: 'image/png',
            size: buffer.length,
        });
        expect(await storage.download('photos', 'emojified/emojified-face.png')).toEqual(buffer);
    });

    it('derives content types from the extension', async () => {
        await storage.upload('photos', 'face.JPG', Buffer.from('a'));
        await storage.upload('photos', 'notes.bin', Buffer.from('b'));

        expect((await storage.getMetadata('photos', 'face.JPG'))?.contentType).toBe('image/jpeg');
        expect((await storage.getMetadata('photos', 'notes.bin'))?.contentType).toBeNull();
    });

    it('returns null for missing objects', async () => {
        await storage.ensureBucket('photos');

        expect(await storage.getMetadata('photos', 'nonexistent.png')).toBeNull();
        expect(await storage.download('photos', 'nonexistent.png')).toBeNull();
    });

    it('refuses keys that escape the bucket', async () => {
        await expect(storage.download('photos', '../secrets.txt')).rejects.toThrow(
            'Object key escapes bucket: ../secrets.txt'
        );
    });

    it('references objects by file URL', () => {
        expect(storage.getObjectUri('photos', 'face.png')).toBe(
            pathToFileURL(path.join(rootDir, 'photos', 'face.png')).href
        );
    });
});

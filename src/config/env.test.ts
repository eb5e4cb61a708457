import { describe, expect, it } from 'vitest';
import { parseEnv } from './env.js';

describe('parseEnv', () => {
    it('applies defaults', () => {
        expect(parseEnv({})).toEqual({
            NODE_ENV: 'development',
            PORT: 3001,
            STORAGE_BUCKET_NAME: undefined,
            USE_MOCK_SERVICES: false,
            AWS_REGION: 'ap-south-1',
            CLOUDFRONT_DOMAIN: undefined,
            EMOJIFY_HAT_OVERLAY: false,
            FRONTEND_URL: undefined,
        });
    });

    it('parses flags, numbers and trims strings', () => {
        const env = parseEnv({
            PORT: '8080',
            STORAGE_BUCKET_NAME: ' photos ',
            USE_MOCK_SERVICES: 'true',
            EMOJIFY_HAT_OVERLAY: 'false',
            FRONTEND_URL: 'https://app.example.com',
        });

        expect(env.PORT).toBe(8080);
        expect(env.STORAGE_BUCKET_NAME).toBe('photos');
        expect(env.USE_MOCK_SERVICES).toBe(true);
        expect(env.EMOJIFY_HAT_OVERLAY).toBe(false);
        expect(env.FRONTEND_URL).toBe('https://app.example.com');
    });

    it('treats an empty bucket name as unset', () => {
        expect(parseEnv({ STORAGE_BUCKET_NAME: '' }).STORAGE_BUCKET_NAME).toBeUndefined();
    });

    it('rejects invalid values', () => {
        expect(() => parseEnv({ USE_MOCK_SERVICES: 'yes' })).toThrow();
        expect(() => parseEnv({ PORT: 'abc' })).toThrow();
        expect(() => parseEnv({ FRONTEND_URL: 'not a url' })).toThrow();
    });
});

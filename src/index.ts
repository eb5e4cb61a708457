import { env } from './config/env.js';
import { createApp } from './app.js';
import { EmojifyService } from './services/emojify.service.js';
import { loadEmojiAssets } from './services/emoji-assets.service.js';
import { imageService } from './services/image.service.js';
import { getFaceDetectionService, getStorageService } from './services/index.js';
import { MockStorageService, UPLOADS_DIR } from './services/mock/storage.service.js';

// Static allowed origins (always allowed)
const ALLOWED_ORIGINS = [
    ...(env.FRONTEND_URL ? [env.FRONTEND_URL] : []),
    'http://localhost:3000',
    'http://localhost:3001',
];

async function main(): Promise<void> {
    // A missing emoji asset is fatal
    const emojis = await loadEmojiAssets();

    const storage = getStorageService();
    if (storage instanceof MockStorageService && env.STORAGE_BUCKET_NAME) {
        await storage.ensureBucket(env.STORAGE_BUCKET_NAME);
    }
    if (!env.STORAGE_BUCKET_NAME) {
        console.warn('⚠️  STORAGE_BUCKET_NAME is not set; every emojify request will fail with error 102');
    }

    const emojifyService = new EmojifyService({
        storage,
        faceDetection: getFaceDetectionService(),
        imageService,
        emojis,
        bucketName: env.STORAGE_BUCKET_NAME,
        hatOverlay: env.EMOJIFY_HAT_OVERLAY,
    });

    const app = createApp({
        emojifyService,
        allowedOrigins: ALLOWED_ORIGINS,
        uploadsDir: env.USE_MOCK_SERVICES ? UPLOADS_DIR : undefined,
    });

    const server = app.listen(env.PORT, () => {
        console.log(`🚀 Server running on http://localhost:${env.PORT}`);
        console.log(`📦 Mock services: ${env.USE_MOCK_SERVICES ? 'ENABLED' : 'DISABLED'}`);
        console.log(`🎩 Hat overlay: ${env.EMOJIFY_HAT_OVERLAY ? 'ENABLED' : 'DISABLED'}`);
    });

    // Graceful shutdown
    process.on('SIGTERM', () => {
        console.log('SIGTERM received, shutting down...');
        server.close(() => process.exit(0));
    });
}

main().catch((error) => {
    console.error('❌ Failed to start server:', error);
    process.exit(1);
});

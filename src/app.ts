import express, { type Express } from 'express';
import cors from 'cors';
import { createEmojifyRouter } from './routes/emojify.routes.js';
import { errorHandler, notFound } from './middleware/error.middleware.js';
import type { EmojifyService } from './services/emojify.service.js';

export interface AppOptions {
    emojifyService: EmojifyService;
    /** Browser origins allowed to call the API */
    allowedOrigins?: string[];
    /** Serve the mock storage folder under /uploads */
    uploadsDir?: string;
}

export function createApp(options: AppOptions): Express {
    const app = express();
    const allowedOrigins = new Set(options.allowedOrigins || []);

    app.use(cors({
        origin: (origin, callback) => {
            // Allow requests without Origin header (same-origin, curl, etc.)
            if (!origin || allowedOrigins.has(origin)) {
                callback(null, origin || true);
            } else {
                console.log(`[CORS] Blocked origin: ${origin}`);
                callback(null, false);
            }
        },
    }));

    // Serve emojified images in mock mode
    if (options.uploadsDir) {
        app.use('/uploads', express.static(options.uploadsDir));
    }

    // Health check
    app.get('/health', (req, res) => {
        res.json({ status: 'ok', timestamp: new Date().toISOString() });
    });

    app.use(createEmojifyRouter(options.emojifyService));

    app.use((req, res, next) => {
        next(notFound(`Cannot ${req.method} ${req.path}`));
    });

    // Error handling
    app.use(errorHandler);

    return app;
}

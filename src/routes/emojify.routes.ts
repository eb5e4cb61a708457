/**
 * Emojify Routes
 *
 * GET /          Greeting
 * GET /emojify   Cover the faces in a stored image with emojis
 */

import { Router, type Request, type Response, type NextFunction } from 'express';
import { z } from 'zod';
import type { EmojifyService } from '../services/emojify.service.js';

// A missing parameter counts as empty; a repeated one uses its first value
const emojifyQuerySchema = z.object({
    objectName: z
        .union([z.string(), z.array(z.string())])
        .optional()
        .transform((value) => (Array.isArray(value) ? value[0] ?? '' : value ?? '')),
});

export function createEmojifyRouter(emojifyService: EmojifyService): Router {
    const router = Router();

    router.get('/', (req: Request, res: Response) => {
        res.type('text/plain').send('Hi there!');
    });

    /**
     * GET /emojify?objectName=<name>
     * Success: { objectPath, emojifiedUrl, statusCode }
     * Failure: { statusCode, errorCode, errorMessage }
     * The HTTP status matches statusCode.
     */
    router.get('/emojify', async (req: Request, res: Response, next: NextFunction) => {
        try {
            const { objectName } = emojifyQuerySchema.parse(req.query);
            const result = await emojifyService.execute(objectName);
            res.status(result.statusCode).json(result);
        } catch (error) {
            next(error);
        }
    });

    return router;
}

import dotenv from 'dotenv';
import { z } from 'zod';

// Load environment variables
dotenv.config();

// "true"/"false" toggles; z.coerce.boolean() would treat "false" as true
const booleanFlag = z
    .enum(['true', 'false'])
    .default('false')
    .transform((value) => value === 'true');

const optionalString = z
    .string()
    .trim()
    .optional()
    .transform((value) => value || undefined);

const envSchema = z.object({
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
    PORT: z.coerce.number().int().positive().default(3001),

    // Bucket holding source images and emojified results.
    // Left optional: a missing bucket is reported per request (error 102).
    STORAGE_BUCKET_NAME: optionalString,

    USE_MOCK_SERVICES: booleanFlag,
    AWS_REGION: z.string().trim().min(1).default('ap-south-1'),
    CLOUDFRONT_DOMAIN: optionalString,

    EMOJIFY_HAT_OVERLAY: booleanFlag,
    FRONTEND_URL: optionalString.pipe(z.string().url().optional()),
});

export type Env = z.infer<typeof envSchema>;

export function parseEnv(source: NodeJS.ProcessEnv): Env {
    return envSchema.parse(source);
}

export const env = parseEnv(process.env);

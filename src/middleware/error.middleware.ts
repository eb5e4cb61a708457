import type { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';

export interface ApiError extends Error {
    statusCode?: number;
    code?: string;
}

/**
 * Application error codes returned in the emojify envelope.
 * The integer values are part of the public contract.
 */
export enum EmojifyErrorCode {
    Other = 100,
    SlashesForbidden = 101,
    BucketMisconfigured = 102,
    BlobNotFound = 103,
    ContentTypeMissing = 104,
    ResponseCountMismatch = 105,
    ObjectNameMissing = 106,
    NoFacesDetected = 107,
}

export const EMOJIFY_ERRORS: Readonly<Record<EmojifyErrorCode, { statusCode: number; message: string }>> = {
    [EmojifyErrorCode.Other]: { statusCode: 500, message: 'Other' },
    [EmojifyErrorCode.SlashesForbidden]: {
        statusCode: 400,
        message: 'Slashes are intentionally forbidden in objectName.',
    },
    [EmojifyErrorCode.BucketMisconfigured]: {
        statusCode: 500,
        message: 'STORAGE_BUCKET_NAME is missing or names a bucket that does not exist.',
    },
    [EmojifyErrorCode.BlobNotFound]: { statusCode: 400, message: "Blob specified doesn't exist in bucket." },
    [EmojifyErrorCode.ContentTypeMissing]: { statusCode: 400, message: 'blob ContentType is null.' },
    [EmojifyErrorCode.ResponseCountMismatch]: { statusCode: 500, message: 'Size of responses list is not 1.' },
    [EmojifyErrorCode.ObjectNameMissing]: { statusCode: 400, message: 'objectName is null.' },
    [EmojifyErrorCode.NoFacesDetected]: { statusCode: 400, message: "We couldn't detect faces in your image." },
};

export interface EmojifyError extends ApiError {
    statusCode: number;
    errorCode: EmojifyErrorCode;
}

export function errorHandler(
    err: ApiError,
    req: Request,
    res: Response,
    next: NextFunction
) {
    console.error('Error:', err);

    if (err instanceof ZodError) {
        res.status(400).json({
            error: {
                message: err.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; '),
                code: 'BAD_REQUEST',
            },
        });
        return;
    }

    const statusCode = err.statusCode || 500;
    const message = err.message || 'Internal server error';

    res.status(statusCode).json({
        error: {
            message,
            code: err.code || 'INTERNAL_ERROR',
            ...(process.env.NODE_ENV === 'development' && { stack: err.stack }),
        },
    });
}

export function createError(message: string, statusCode: number, code?: string): ApiError {
    const error: ApiError = new Error(message);
    error.statusCode = statusCode;
    error.code = code;
    return error;
}

/**
 * Builds an error carrying one of the emojify codes.
 * `message` overrides the default text (used for provider-reported errors).
 */
export function emojifyError(errorCode: EmojifyErrorCode, message?: string): EmojifyError {
    const { statusCode, message: defaultMessage } = EMOJIFY_ERRORS[errorCode];
    const error = createError(message || defaultMessage, statusCode, EmojifyErrorCode[errorCode]);
    return Object.assign(error, { statusCode, errorCode });
}

export function isEmojifyError(error: unknown): error is EmojifyError {
    return error instanceof Error && 'errorCode' in error && typeof error.errorCode === 'number';
}

export function notFound(message = 'Resource not found'): ApiError {
    return createError(message, 404, 'NOT_FOUND');
}

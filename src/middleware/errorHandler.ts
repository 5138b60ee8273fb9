// src/middleware/errorHandler.ts

import { NextFunction, Request, Response } from 'express';
import { ClinicStoreErrorCode, isClinicStoreError } from '../models/errors';
import logger from '../utils/logger';

const STATUS_BY_CODE: Record<ClinicStoreErrorCode, number> = {
    NOT_FOUND: 404,
    DUPLICATE_KEY: 409,
    CONFLICT: 409,
    INVALID_TIME_WINDOW: 422,
    FORMAT_ERROR: 500,
    IO_ERROR: 500
};

/**
 * Map store errors to HTTP statuses, everything else to 500
 */
export function errorHandler(err: Error, req: Request, res: Response, _next: NextFunction): void {
    if (isClinicStoreError(err)) {
        const status = STATUS_BY_CODE[err.code];
        if (status >= 500) {
            logger.error(`[ErrorHandler] ${req.method} ${req.url}:`, err.message);
        } else {
            logger.debug(`[ErrorHandler] ${req.method} ${req.url}: ${err.code}`);
        }
        res.status(status).json({ error: err.code, message: err.message });
        return;
    }

    if (isBodyParseError(err)) {
        logger.debug(`[ErrorHandler] ${req.method} ${req.url}: malformed JSON body`);
        res.status(400).json({
            error: 'Validation Error',
            details: [{ path: 'body', message: err.message }]
        });
        return;
    }

    logger.error('[ErrorHandler] Unexpected error:', err.stack);
    res.status(500).json({ error: 'INTERNAL_ERROR', message: err.message });
}

/**
 * express.json() rejects unparsable bodies with `type: 'entity.parse.failed'`
 */
function isBodyParseError(err: Error): boolean {
    return 'type' in err && err.type === 'entity.parse.failed';
}

export function notFoundHandler(req: Request, res: Response): void {
    res.status(404).json({
        error: 'Not Found',
        message: `Route ${req.method} ${req.url} not found`
    });
}

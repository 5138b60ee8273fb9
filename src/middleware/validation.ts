// src/middleware/validation.ts

import { NextFunction, Request, RequestHandler, Response } from 'express';
import { AnyZodObject, ZodError, z } from 'zod';

/**
 * Route handler that receives the parsed `{ body, params }` of its schema
 */
export type ValidatedHandler<S extends AnyZodObject> = (
    input: z.infer<S>,
    req: Request,
    res: Response
) => Promise<void>;

/**
 * Parse the request against a schema, then run the handler
 *
 * Validation failures answer 400 with per-path details. Anything the
 * handler throws (or rejects with) goes to the error middleware.
 */
export const validated = <S extends AnyZodObject>(schema: S, handler: ValidatedHandler<S>): RequestHandler => (
    req: Request,
    res: Response,
    next: NextFunction
): void => {
    const result = schema.safeParse({
        body: req.body,
        params: req.params
    });

    if (!result.success) {
        res.status(400).json(formatValidationError(result.error));
        return;
    }

    handler(result.data, req, res).catch(next);
};

/**
 * Wrap an async handler without a schema
 */
export const asyncHandler = (handler: (req: Request, res: Response) => Promise<void>): RequestHandler => (
    req: Request,
    res: Response,
    next: NextFunction
): void => {
    handler(req, res).catch(next);
};

export function formatValidationError(error: ZodError): { error: string; details: { path: string; message: string }[] } {
    return {
        error: 'Validation Error',
        details: error.errors.map(err => ({
            path: err.path.join('.'),
            message: err.message
        }))
    };
}

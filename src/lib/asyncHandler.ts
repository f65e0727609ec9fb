import type { NextFunction, Request, RequestHandler, Response } from 'express';

/**
 * Forwards rejections from async route handlers to Express' error middleware.
 */
export function asyncHandler(
    handler: (req: Request, res: Response, next: NextFunction) => Promise<unknown>
): RequestHandler {
    return function asyncHandled(req, res, next) {
        handler(req, res, next).catch(next);
    };
}

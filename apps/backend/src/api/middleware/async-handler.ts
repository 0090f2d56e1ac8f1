import type { NextFunction, Request, Response } from 'express';

/**
 * Async handler wrapper for Express route handlers.
 *
 * Express 4 ignores the promise a handler returns, so a rejection would never
 * reach the error middleware. The wrapper forwards it to `next()`.
 *
 * @param fn - Async route handler function to wrap
 * @returns Handler that passes rejections to next()
 *
 * @example
 * router.get('/:page', asyncHandler(controller.listSections.bind(controller)));
 */
export function asyncHandler(
    fn: (req: Request, res: Response, next: NextFunction) => Promise<void>
) {
    return (req: Request, res: Response, next: NextFunction) => {
        fn(req, res, next).catch(next);
    };
}

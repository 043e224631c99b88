import type { NextFunction, Request, RequestHandler, Response } from 'express';

type AsyncRoute<ResBody> = (req: Request, res: Response<ResBody>, next: NextFunction) => Promise<void>;

/**
 * Express 4 does not await handlers; a rejection has to be handed to `next`
 * for the error middleware to see it.
 */
export function asyncHandler<ResBody = unknown>(fn: AsyncRoute<ResBody>): RequestHandler<Record<string, string>, ResBody> {
  return (req, res, next) => {
    fn(req, res, next).catch(next);
  };
}

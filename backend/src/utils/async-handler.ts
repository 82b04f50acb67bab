import type { NextFunction, Request, RequestHandler, Response } from 'express';

/** Routes a rejected handler promise to the error handler instead of leaving it unhandled. */
export function asyncHandler(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<void>
): RequestHandler {
  return (req, res, next) => {
    fn(req, res, next).catch(next);
  };
}

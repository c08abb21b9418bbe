import { Request, Response, NextFunction } from 'express';

export type AsyncRequestHandler<Req extends Request = Request> = (
  req: Req,
  res: Response,
  next: NextFunction
) => void | Promise<void>;

/** Forwards both rejected promises and synchronous throws to the error middleware. */
export function asyncHandler<Req extends Request = Request>(fn: AsyncRequestHandler<Req>) {
  return (req: Req, res: Response, next: NextFunction): void => {
    Promise.resolve()
      .then(() => fn(req, res, next))
      .catch(next);
  };
}

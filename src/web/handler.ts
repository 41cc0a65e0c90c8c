import type { NextFunction, Request, RequestHandler, Response } from 'express';
import { NotFoundError } from '../errors';

type AsyncRequestHandler = (req: Request, res: Response, next: NextFunction) => Promise<void>;

/**
 * Forward rejected promises of async handlers to the error middleware
 */
export function asyncHandler(handler: AsyncRequestHandler): RequestHandler {
  return (req, res, next) => {
    handler(req, res, next).catch(next);
  };
}

/**
 * Parse a positive integer route id
 * @throws NotFoundError for anything else
 */
export function parseId(value: string | undefined, resource: string): number {
  if (value === undefined || !/^[1-9]\d*$/.test(value)) {
    throw new NotFoundError(resource);
  }
  const id = Number(value);
  if (!Number.isSafeInteger(id)) {
    throw new NotFoundError(resource);
  }
  return id;
}

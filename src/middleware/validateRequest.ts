import type { NextFunction, Request, RequestHandler, Response } from "express";
import type { ZodType, ZodTypeDef } from "zod";

type Schema<T> = ZodType<T, ZodTypeDef, unknown>;

type RouteHandler = (req: Request, res: Response) => void | Promise<void>;

type ValidatedHandler<T> = (input: T, req: Request, res: Response) => void | Promise<void>;

/** Forwards rejections to the error handler; Express 4 does not. */
export const asyncHandler = (handler: RouteHandler): RequestHandler => {
  return (req: Request, res: Response, next: NextFunction) => {
    Promise.resolve()
      .then(() => handler(req, res))
      .catch(next);
  };
};

const validate = <T>(
  schema: Schema<T>,
  pick: (req: Request) => unknown,
  handler: ValidatedHandler<T>,
): RequestHandler =>
  asyncHandler(async (req, res) => {
    // A ZodError thrown here becomes a 400 in errorHandler.
    const input = schema.parse(pick(req));
    await handler(input, req, res);
  });

export const validateBody = <T>(schema: Schema<T>, handler: ValidatedHandler<T>): RequestHandler =>
  validate(schema, (req) => req.body, handler);

export const validateQuery = <T>(schema: Schema<T>, handler: ValidatedHandler<T>): RequestHandler =>
  validate(schema, (req) => req.query, handler);

export default validateBody;

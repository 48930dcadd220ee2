import type { RequestHandler } from 'express';
import type { ZodTypeAny } from 'zod';

interface ValidationSchema {
  body?: ZodTypeAny;
  params?: ZodTypeAny;
}

/**
 * Replaces `req.body` / `req.params` with their parsed form. A failed parse is
 * handed to the error handler as the original `ZodError`.
 */
export const validateRequest = (schema: ValidationSchema): RequestHandler => {
  return (req, _res, next) => {
    if (schema.body) {
      const body = schema.body.safeParse(req.body ?? {});
      if (!body.success) return next(body.error);
      req.body = body.data;
    }
    if (schema.params) {
      const params = schema.params.safeParse(req.params);
      if (!params.success) return next(params.error);
      req.params = params.data;
    }
    next();
  };
};

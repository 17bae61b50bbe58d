/**
 * Validation Middleware
 *
 * Provides Zod-based request body validation.
 * Integrates with existing error handling via ValidationError.
 */

import type { Request, Response, NextFunction, RequestHandler } from "express";
import { ZodError, type ZodSchema } from "zod";
import { ValidationError } from "../utils/errorHandler";

export interface ValidationSchemas {
  body: ZodSchema;
}

export function formatZodIssues(error: ZodError): string {
  return error.errors
    .map(e => (e.path.length > 0 ? `${e.path.join(".")}: ${e.message}` : e.message))
    .join(", ");
}

/**
 * Creates a validation middleware that validates the request body against a Zod schema.
 * The parsed value (with defaults applied) replaces the raw body.
 *
 * @example
 * app.post("/classify", validate({ body: classifyRequestSchema }), async (req, res) => { ... });
 */
export function validate(schemas: ValidationSchemas): RequestHandler {
  return (req: Request, _res: Response, next: NextFunction) => {
    try {
      req.body = schemas.body.parse(req.body ?? {});
      next();
    } catch (error) {
      if (error instanceof ZodError) {
        next(new ValidationError(formatZodIssues(error)));
      } else {
        next(error);
      }
    }
  };
}

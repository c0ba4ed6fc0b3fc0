/**
 * Validation Middleware
 *
 * Zod-based request validation for body and query.
 * Integrates with existing error handling via ValidationError.
 */

import type { Request, Response, NextFunction, RequestHandler } from "express";
import { ZodError, type ZodSchema } from "zod";
import { askQuerySchema, askRequestSchema } from "@shared/schema";
import { ValidationError } from "../utils/errorHandler";

export interface ValidationSchemas {
  body?: ZodSchema;
  query?: ZodSchema;
}

/**
 * Creates a validation middleware that validates request parts against Zod schemas.
 * Parsed query values land on res.locals.query (Express 4 keeps req.query as
 * a getter-backed ParsedQs).
 *
 * @example
 * app.post("/api/ask", validate({ body: askSchemas.body }), async (req, res) => { ... });
 */
export function validate(schemas: ValidationSchemas): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    try {
      if (schemas.query) {
        res.locals.query = schemas.query.parse(req.query);
      }
      if (schemas.body) {
        req.body = schemas.body.parse(req.body);
      }
      next();
    } catch (error) {
      if (error instanceof ZodError) {
        const messages = error.errors.map(e => e.path.length > 0 ? `${e.path.join('.')}: ${e.message}` : e.message).join(', ');
        next(new ValidationError(messages));
      } else {
        next(error);
      }
    }
  };
}

export const askSchemas = {
  body: askRequestSchema,
  query: askQuerySchema,
};

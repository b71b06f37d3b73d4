/**
 * Request Validation Middleware
 *
 * Validates req.body, req.query and req.params against a Zod schema of the
 * shape `z.object({ body?, query?, params? })`. The parsed body (with
 * coercion and defaults applied) replaces req.body; failures reach the error
 * handler as a 400 VALIDATION_ERROR with field details.
 */

import { Request, Response, NextFunction } from "express";
import { ZodError, ZodType, ZodTypeDef } from "zod";
import { ValidationError } from "../utils/errors";
import logger from "../utils/logger";

type RequestSchema = ZodType<
  { body?: unknown; query?: unknown; params?: unknown },
  ZodTypeDef,
  unknown
>;

export const validateRequest = (schema: RequestSchema) => {
  return async (req: Request, _res: Response, next: NextFunction): Promise<void> => {
    try {
      const validatedData = await schema.parseAsync({
        body: req.body,
        query: req.query,
        params: req.params,
      });

      // Merge validated/coerced body back to request
      if (validatedData.body !== undefined) req.body = validatedData.body;

      next();
    } catch (error) {
      if (error instanceof ZodError) {
        logger.warn("Request validation failed", {
          path: req.path,
          method: req.method,
          errors: error.errors,
        });

        next(
          new ValidationError(
            "Validation failed",
            error.errors.map((err) => ({
              path: err.path.join("."),
              field: err.path[err.path.length - 1],
              message: err.message,
            }))
          )
        );
        return;
      }

      next(error);
    }
  };
};

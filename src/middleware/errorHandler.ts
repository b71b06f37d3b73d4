import { Request, Response, NextFunction } from "express";
import mongoose from "mongoose";
import multer from "multer";
import { AppError, RateLimitError } from "../utils/errors";
import { errorResponse, getRequestId } from "../utils/apiResponse";
import logger from "../utils/logger";

// Error classification for better handling
const isOperationalError = (error: Error): boolean => {
  if (error instanceof AppError) return error.isOperational;

  return (
    error instanceof mongoose.Error.ValidationError ||
    error instanceof mongoose.Error.CastError ||
    error instanceof multer.MulterError ||
    isBodyParseError(error) ||
    isDuplicateKeyError(error)
  );
};

const isDuplicateKeyError = (error: Error): boolean =>
  error.name === "MongoServerError" && "code" in error && error.code === 11000;

// express.json() rejects malformed bodies with a 400 SyntaxError
const isBodyParseError = (error: Error): boolean =>
  error instanceof SyntaxError && "status" in error && error.status === 400;

const sanitizeError = (error: Error): string => {
  if (process.env.NODE_ENV === "production" && !isOperationalError(error)) {
    return "Internal server error";
  }
  return error.message;
};

export const errorHandler = (
  error: Error,
  req: Request,
  res: Response,
  _next: NextFunction
): void => {
  const requestId = getRequestId(req);

  const logContext = {
    requestId,
    method: req.method,
    url: req.url,
    ip: req.ip || req.socket.remoteAddress,
    errorName: error.name,
    errorMessage: error.message,
    isOperational: isOperationalError(error),
    ...(error instanceof AppError && error.details
      ? { details: error.details }
      : {}),
  };

  if (isOperationalError(error)) {
    logger.warn(`[Error] Operational error: ${error.message}`, logContext);
  } else {
    logger.error(`[Error] System error: ${error.message}`, {
      ...logContext,
      stack: error.stack,
    });
  }

  if (error instanceof RateLimitError) {
    res.setHeader("Retry-After", Math.max(1, Math.ceil(error.retryAfterMs / 1000)));
  }

  if (error instanceof AppError) {
    res
      .status(error.statusCode)
      .json(errorResponse(req, sanitizeError(error), error.code, error.details));
    return;
  }

  // Handle Mongoose validation errors
  if (error instanceof mongoose.Error.ValidationError) {
    const details = Object.values(error.errors).map((err) => ({
      field: err.path,
      message: err.message,
    }));
    res.status(400).json(errorResponse(req, "Validation failed", "VALIDATION_ERROR", details));
    return;
  }

  // Handle Mongoose cast errors
  if (error instanceof mongoose.Error.CastError) {
    res.status(400).json(errorResponse(req, "Invalid resource ID format", "INVALID_ID"));
    return;
  }

  // Handle duplicate key errors
  if (isDuplicateKeyError(error)) {
    res.status(409).json(errorResponse(req, "Resource already exists", "DUPLICATE_RESOURCE"));
    return;
  }

  if (error instanceof multer.MulterError) {
    res.status(400).json(errorResponse(req, error.message, "UPLOAD_ERROR"));
    return;
  }

  if (isBodyParseError(error)) {
    res.status(400).json(errorResponse(req, "Malformed JSON body", "INVALID_JSON"));
    return;
  }

  // Handle unexpected errors
  res.status(500).json(errorResponse(req, sanitizeError(error), "INTERNAL_ERROR"));
};

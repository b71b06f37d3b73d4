/**
 * API Response Utilities
 *
 * Standardized response format helpers for consistent API responses.
 * All endpoints should use these helpers to ensure uniform response structure.
 */

import { Request } from "express";
import { ApiResponse, ApiError } from "../types";
import "../types/express";

/**
 * Get request ID from the request metrics or headers, or generate a fallback
 */
export function getRequestId(req: Request): string {
  if (req.metrics?.requestId) return req.metrics.requestId;
  const header = req.headers["x-request-id"];
  return typeof header === "string" && header !== "" ? header : `req_${Date.now()}`;
}

/**
 * Create a standard success response
 */
export function successResponse<T>(
  req: Request,
  data: T,
  options?: { message?: string }
): ApiResponse<T> {
  const response: ApiResponse<T> = {
    data,
    requestId: getRequestId(req),
  };

  if (options?.message) {
    response.message = options.message;
  }

  return response;
}

/**
 * Create a standard error response
 */
export function errorResponse(
  req: Request,
  message: string,
  code: string,
  details?: unknown
): ApiError {
  return {
    error: {
      message,
      code,
      ...(details ? { details } : {}),
    },
    requestId: getRequestId(req),
  };
}

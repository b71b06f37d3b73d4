/**
 * Shared API response shapes
 */

/**
 * Standard API error response
 */
export interface ApiError {
  error: {
    message: string;
    code: string;
    details?: unknown;
  };
  requestId: string;
}

/**
 * Standard API success response
 */
export interface ApiResponse<TData = unknown> {
  data: TData;
  requestId: string;
  message?: string;
}

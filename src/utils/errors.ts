export class AppError extends Error {
  public readonly statusCode: number;
  public readonly code: string;
  public readonly isOperational: boolean;
  public readonly details?: unknown;

  constructor(
    message: string,
    statusCode: number,
    code: string,
    details?: unknown,
    isOperational = true
  ) {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.code = code;
    this.isOperational = isOperational;
    this.details = details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 400, "VALIDATION_ERROR", details);
  }
}

// bad credentials on login
export class AuthenticationError extends AppError {
  constructor(message: string = "Authentication required", details?: unknown) {
    super(message, 401, "UNAUTHENTICATED", details, true);
  }
}

export class NotFoundError extends AppError {
  constructor(message: string = "Resource not found") {
    super(message, 404, "NOT_FOUND");
  }
}

export class ConflictError extends AppError {
  constructor(message: string) {
    super(message, 409, "CONFLICT");
  }
}

export class AlreadySoldError extends AppError {
  constructor(listingId: string) {
    super("Listing already sold", 409, "ALREADY_SOLD", { listing_id: listingId });
  }
}

export class SellerNotPayableError extends AppError {
  constructor(listingId: string) {
    super(
      "Seller is not connected to a payout account",
      400,
      "SELLER_NOT_PAYABLE",
      { listing_id: listingId }
    );
  }
}

/**
 * With fee splitting the platform fee is taken from the charge, so the charge
 * must be larger than the fee.
 */
export class PriceBelowPlatformFeeError extends AppError {
  constructor(listingId: string, amount: number, platformFee: number) {
    super(
      "Listing price does not cover the platform fee",
      400,
      "PRICE_BELOW_PLATFORM_FEE",
      { listing_id: listingId, amount, platform_fee: platformFee }
    );
  }
}

/**
 * Webhook authenticity failure. The message stays generic; callers log the
 * underlying reason themselves.
 */
export class InvalidSignatureError extends AppError {
  constructor() {
    super("Invalid webhook signature", 400, "INVALID_SIGNATURE");
  }
}

/**
 * Any rejected reset token: expired, forged, malformed or already used.
 */
export class InvalidResetTokenError extends AppError {
  constructor() {
    super("Invalid or expired token", 400, "INVALID_TOKEN");
  }
}

export interface PaymentProcessorErrorDetails {
  type?: string | undefined;
  code?: string | undefined;
  status_code?: number | undefined;
  request_id?: string | undefined;
}

/**
 * The payment processor was unreachable, timed out or rejected the request.
 * Nothing was written locally, so the caller may retry.
 */
export class PaymentProcessorError extends AppError {
  constructor(message: string, details?: PaymentProcessorErrorDetails) {
    super(message, 502, "PAYMENT_PROCESSOR_ERROR", details);
  }
}

export class MessagingError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 502, "MESSAGING_FAILED", details);
  }
}

export class RateLimitError extends AppError {
  public readonly retryAfterMs: number;

  constructor(retryAfterMs: number) {
    super(
      "Too many requests, please try again later",
      429,
      "RATE_LIMIT_EXCEEDED"
    );
    this.retryAfterMs = retryAfterMs;
  }
}

export class ConfigError extends Error {
  public readonly problems: string[];

  constructor(problems: string[]) {
    super(`Invalid configuration: ${problems.join("; ")}`);
    this.name = "ConfigError";
    this.problems = problems;
  }
}

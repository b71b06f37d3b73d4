import { Request, Response, NextFunction, RequestHandler } from "express";
import { randomUUID } from "crypto";
import { apiLogger, rateLimitLogger } from "../utils/logger";
import { getRequestId } from "../utils/apiResponse";
import { RateLimitError } from "../utils/errors";
import { SlidingWindowRateLimiter } from "../services/rateLimit/RateLimiter";
import "../types/express";

// Request ID middleware - adds unique identifier to each request
export const requestId = (
  req: Request,
  res: Response,
  next: NextFunction
): void => {
  const header = req.headers["x-request-id"];
  const id = typeof header === "string" && header !== "" ? header : randomUUID();
  req.headers["x-request-id"] = id;
  res.setHeader("x-request-id", id);

  req.metrics = {
    startTime: Date.now(),
    requestId: id,
  };

  next();
};

// Request logging with performance metrics
export const requestLogger = (
  req: Request,
  res: Response,
  next: NextFunction
): void => {
  const requestId = getRequestId(req);

  apiLogger.http(`📨 ${req.method} ${req.url}`, {
    requestId,
    userAgent: req.headers["user-agent"],
    ip: req.ip || req.socket.remoteAddress,
    contentLength: req.headers["content-length"] || 0,
  });

  res.on("finish", () => {
    const duration = req.metrics ? Date.now() - req.metrics.startTime : 0;
    const level = res.statusCode >= 400 ? "warn" : "info";
    const emoji = res.statusCode >= 400 ? "❌" : "✅";

    apiLogger.log(
      level,
      `${emoji} ${req.method} ${req.url} ${res.statusCode} - ${duration}ms`,
      {
        requestId,
        statusCode: res.statusCode,
        duration,
      }
    );

    if (duration > 1000) {
      apiLogger.warn(
        `🐌 Slow request detected: ${req.method} ${req.url} took ${duration}ms`,
        { requestId, threshold: "1000ms" }
      );
    }
  });

  res.on("error", (error) => {
    apiLogger.error(`💥 Response error for ${req.method} ${req.url}`, {
      requestId,
      error: error.message,
      stack: error.stack,
    });
  });

  next();
};

/**
 * Per-client admission through a sliding-window limiter. Clients are keyed by
 * IP; `scope` only labels the log lines.
 */
export const rateLimit = (
  limiter: SlidingWindowRateLimiter,
  scope: string
): RequestHandler => {
  return (req, res, next) => {
    const clientId = req.ip || req.socket.remoteAddress || "unknown";
    const decision = limiter.check(clientId);

    res.setHeader("X-RateLimit-Limit", decision.limit);
    res.setHeader("X-RateLimit-Remaining", decision.remaining);

    if (!decision.allowed) {
      rateLimitLogger.warn(`🚦 Rate limit exceeded for client ${clientId}`, {
        requestId: getRequestId(req),
        clientId,
        scope,
        limit: decision.limit,
        retryAfterMs: decision.retryAfterMs,
      });
      next(new RateLimitError(decision.retryAfterMs));
      return;
    }

    next();
  };
};

// Health check with system metrics
export const healthCheck = (req: Request, res: Response): void => {
  res.json({
    status: "healthy",
    timestamp: new Date().toISOString(),
    uptime: process.uptime(),
    memory: {
      used: Math.round(process.memoryUsage().heapUsed / 1024 / 1024),
      total: Math.round(process.memoryUsage().heapTotal / 1024 / 1024),
    },
    system: {
      platform: process.platform,
      nodeVersion: process.version,
      pid: process.pid,
    },
    requestId: getRequestId(req),
  });
};

// 404 handler for unmatched routes
export const notFoundHandler = (req: Request, res: Response): void => {
  const requestId = getRequestId(req);

  apiLogger.warn(`🗺️ Route not found: ${req.method} ${req.path}`, {
    requestId,
    ip: req.ip || req.socket.remoteAddress,
  });

  res.status(404).json({
    error: {
      message: `Route ${req.method} ${req.path} not found`,
      code: "ROUTE_NOT_FOUND",
    },
    requestId,
  });
};

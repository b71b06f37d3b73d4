import winston from "winston";
import DailyRotateFile from "winston-daily-rotate-file";
import path from "path";
import Transport from "winston-transport";

// Define log levels
const levels = {
  error: 0,
  warn: 1,
  info: 2,
  http: 3,
  debug: 4,
};

const colors = {
  error: "red",
  warn: "yellow",
  info: "green",
  http: "magenta",
  debug: "white",
};

winston.addColors(colors);

const format = winston.format.combine(
  winston.format.timestamp({ format: "YYYY-MM-DD HH:mm:ss:ms" }),
  winston.format.colorize({ all: true }),
  winston.format.printf(
    (info) => `${info.timestamp} ${info.level}: ${info.message}`
  )
);

// Keeps only entries written through a given child logger
export const onlyModule = (module: string) =>
  winston.format((info) => (info.module === module ? info : false))();

const rotatingFile = (
  name: string,
  options: { level?: string; module?: string } = {}
): DailyRotateFile =>
  new DailyRotateFile({
    filename: path.join(process.cwd(), "logs", `${name}-%DATE%.log`),
    datePattern: "YYYY-MM-DD",
    ...(options.level ? { level: options.level } : {}),
    format: winston.format.combine(
      ...(options.module ? [onlyModule(options.module)] : []),
      winston.format.timestamp(),
      winston.format.errors({ stack: true }),
      winston.format.json()
    ),
    maxSize: "20m",
    maxFiles: "14d",
  });

const transports: Transport[] = [
  new winston.transports.Console({
    level: process.env.LOG_LEVEL || "debug",
    format,
  }),
];

// No log files from test runs
if (process.env.NODE_ENV !== "test") {
  transports.push(
    rotatingFile("error", { level: "error" }),
    rotatingFile("combined"),
    rotatingFile("stripe", { module: "stripe" }),
    rotatingFile("webhooks", { module: "webhook" })
  );
}

const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || "info",
  levels,
  format,
  transports,
});

// Child loggers for specific modules
export const stripeLogger = logger.child({ module: "stripe" });
export const webhookLogger = logger.child({ module: "webhook" });
export const checkoutLogger = logger.child({ module: "checkout" });
export const authLogger = logger.child({ module: "auth" });
export const rateLimitLogger = logger.child({ module: "ratelimit" });
export const dbLogger = logger.child({ module: "database" });
export const apiLogger = logger.child({ module: "api" });

export default logger;

// Helper for logging webhook events
export const logWebhookEvent = (
  eventType: string,
  eventId: string
): void => {
  webhookLogger.info(`📥 Webhook received: ${eventType}`, {
    eventType,
    eventId,
    timestamp: new Date().toISOString(),
  });
};

// Helper for logging Stripe API calls
export const logStripeApiCall = (
  method: string,
  endpoint: string,
  error?: Error
): void => {
  const level = error ? "error" : "info";
  const emoji = error ? "❌" : "✅";

  stripeLogger.log(level, `${emoji} Stripe API: ${method} ${endpoint}`, {
    method,
    endpoint,
    error: error?.message,
    timestamp: new Date().toISOString(),
  });
};

// Helper for logging account operations
export const logAccountOperation = (
  operation: string,
  username: string,
  data?: Record<string, unknown>
): void => {
  authLogger.info(`👤 Account ${operation}`, {
    operation,
    username,
    data,
    timestamp: new Date().toISOString(),
  });
};

// Helper for logging database operations
export const logDatabaseOperation = (
  operation: string,
  collection: string,
  query?: Record<string, unknown>,
  error?: unknown
): void => {
  const level = error ? "error" : "debug";
  dbLogger.log(level, `🗄️ DB ${operation}: ${collection}`, {
    operation,
    collection,
    query,
    error: error instanceof Error ? error.message : error,
    timestamp: new Date().toISOString(),
  });
};

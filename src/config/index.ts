import dotenv from "dotenv";
import { ConfigError } from "../utils/errors";

dotenv.config();

export interface RateLimitSettings {
  max: number;
  windowMs: number;
}

export interface Config {
  port: number;
  mongoUri: string;
  mongoDbName: string | undefined;
  nodeEnv: string;
  logLevel: string;
  appUrl: string; // Base URL for processor callbacks
  frontendUrl: string;
  allowedOrigins: string[]; // empty: any origin
  trustProxy: boolean;

  stripe: {
    secretKey: string;
    webhookSecret: string;
    timeoutMs: number;
    webhookToleranceSeconds: number;
  };

  checkout: {
    currency: string;
    feeSplitting: boolean; // parsed strictly from 0|1
    platformFeeCents: number;
    successUrl: string;
    cancelUrl: string;
  };

  resetToken: {
    secret: string;
    ttlSeconds: number;
    resetUrlBase: string;
  };

  smtp: {
    host: string;
    port: number;
    user: string;
    pass: string;
    from: string;
  };

  rateLimit: {
    credentials: RateLimitSettings;
    checkout: RateLimitSettings;
    reapIntervalMs: number;
  };

  imagesDir: string;
  bcryptRounds: number;
}

export const requiredEnvVars = [
  "MONGODB_URI",
  "STRIPE_SECRET_KEY",
  "STRIPE_WEBHOOK_SECRET",
  "RESET_TOKEN_SECRET",
  "CHECKOUT_FEE_SPLITTING",
] as const;

const MIN_PRODUCTION_SECRET_LENGTH = 32;

/**
 * Reads and validates the environment. Every problem is collected so a
 * misconfigured deploy reports them all at once.
 *
 * @throws ConfigError
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const problems: string[] = [];

  for (const envVar of requiredEnvVars) {
    if (!env[envVar] || env[envVar]?.trim() === "") {
      problems.push(`Missing required environment variable: ${envVar}`);
    }
  }

  const parseInteger = (
    key: string,
    fallback: number,
    { min, max }: { min: number; max?: number }
  ): number => {
    const raw = env[key];
    if (raw === undefined || raw.trim() === "") return fallback;
    const value = Number(raw);
    if (!Number.isInteger(value) || value < min || (max !== undefined && value > max)) {
      problems.push(
        `Invalid ${key} value: "${raw}". Must be an integer >= ${min}${
          max !== undefined ? ` and <= ${max}` : ""
        }.`
      );
      return fallback;
    }
    return value;
  };

  const parseFeatureFlag = (key: string, fallback = false): boolean => {
    const value = env[key];
    if (value === undefined || value === "") return fallback;
    if (value !== "0" && value !== "1") {
      problems.push(`Invalid ${key} value: "${value}". Must be either "0" or "1".`);
      return fallback;
    }
    return value === "1";
  };

  const nodeEnv = env.NODE_ENV || "development";
  const appUrl = (env.APP_URL || "http://localhost:3000").replace(/\/+$/, "");
  const frontendUrl = (env.FRONTEND_URL || "http://127.0.0.1:5500/frontend").replace(
    /\/+$/,
    ""
  );

  const resetTokenSecret = env.RESET_TOKEN_SECRET || "";
  if (
    nodeEnv === "production" &&
    resetTokenSecret !== "" &&
    resetTokenSecret.length < MIN_PRODUCTION_SECRET_LENGTH
  ) {
    problems.push(
      `RESET_TOKEN_SECRET must be at least ${MIN_PRODUCTION_SECRET_LENGTH} characters in production.`
    );
  }

  const config: Config = {
    port: parseInteger("PORT", 3000, { min: 1, max: 65535 }),
    mongoUri: env.MONGODB_URI || "",
    mongoDbName: env.MONGODB_DB_NAME || undefined,
    nodeEnv,
    logLevel: env.LOG_LEVEL || "info",
    appUrl,
    frontendUrl,
    allowedOrigins: (env.ALLOWED_ORIGINS || "")
      .split(",")
      .map((origin) => origin.trim())
      .filter((origin) => origin.length > 0),
    trustProxy: parseFeatureFlag("TRUST_PROXY"),

    stripe: {
      secretKey: env.STRIPE_SECRET_KEY || "",
      webhookSecret: env.STRIPE_WEBHOOK_SECRET || "",
      timeoutMs: parseInteger("STRIPE_TIMEOUT_MS", 10000, { min: 1000 }),
      webhookToleranceSeconds: parseInteger("STRIPE_WEBHOOK_TOLERANCE_SECONDS", 300, {
        min: 1,
      }),
    },

    checkout: {
      currency: (env.CHECKOUT_CURRENCY || "usd").toLowerCase(),
      feeSplitting: parseFeatureFlag("CHECKOUT_FEE_SPLITTING"),
      platformFeeCents: parseInteger("PLATFORM_FEE_CENTS", 123, { min: 0 }),
      successUrl: env.CHECKOUT_SUCCESS_URL || `${appUrl}/api/v1/checkout/success`,
      cancelUrl: env.CHECKOUT_CANCEL_URL || `${appUrl}/api/v1/checkout/cancel`,
    },

    resetToken: {
      secret: resetTokenSecret,
      ttlSeconds: parseInteger("RESET_TOKEN_TTL_SECONDS", 30 * 60, { min: 60 }),
      resetUrlBase: env.RESET_URL_BASE || `${frontendUrl}/reset-password.html`,
    },

    smtp: {
      host: env.SMTP_HOST || "",
      port: parseInteger("SMTP_PORT", 587, { min: 1, max: 65535 }),
      user: env.SMTP_USER || "",
      pass: env.SMTP_PASS || "",
      from: env.SMTP_FROM || env.SMTP_USER || "no-reply@localhost",
    },

    rateLimit: {
      credentials: {
        max: parseInteger("RATE_LIMIT_CREDENTIALS_MAX", 5, { min: 1 }),
        windowMs: parseInteger("RATE_LIMIT_CREDENTIALS_WINDOW_MS", 60_000, { min: 1000 }),
      },
      checkout: {
        max: parseInteger("RATE_LIMIT_CHECKOUT_MAX", 20, { min: 1 }),
        windowMs: parseInteger("RATE_LIMIT_CHECKOUT_WINDOW_MS", 60_000, { min: 1000 }),
      },
      reapIntervalMs: parseInteger("RATE_LIMIT_REAP_INTERVAL_MS", 5 * 60_000, {
        min: 1000,
      }),
    },

    imagesDir: env.IMAGES_DIR || "images",
    bcryptRounds: parseInteger("BCRYPT_ROUNDS", 12, { min: 4, max: 15 }),
  };

  if (problems.length > 0) {
    throw new ConfigError(problems);
  }

  return config;
}

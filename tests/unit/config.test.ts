import { loadConfig, requiredEnvVars } from "../../src/config";
import { ConfigError } from "../../src/utils/errors";

const baseEnv: NodeJS.ProcessEnv = {
  MONGODB_URI: "mongodb://localhost:27017/marketplace_test",
  STRIPE_SECRET_KEY: "sk_test_placeholder",
  STRIPE_WEBHOOK_SECRET: "whsec_test_secret",
  RESET_TOKEN_SECRET: "test-secret",
  CHECKOUT_FEE_SPLITTING: "0",
};

const problemsOf = (env: NodeJS.ProcessEnv): string[] => {
  try {
    loadConfig(env);
  } catch (error) {
    if (error instanceof ConfigError) return error.problems;
    throw error;
  }
  return [];
};

describe("loadConfig", () => {
  it("reports every missing required variable at once", () => {
    expect(problemsOf({})).toEqual(
      requiredEnvVars.map((name) => `Missing required environment variable: ${name}`)
    );
  });

  it("applies defaults", () => {
    const config = loadConfig(baseEnv);

    expect(config.port).toBe(3000);
    expect(config.checkout).toEqual({
      currency: "usd",
      feeSplitting: false,
      platformFeeCents: 123,
      successUrl: "http://localhost:3000/api/v1/checkout/success",
      cancelUrl: "http://localhost:3000/api/v1/checkout/cancel",
    });
    expect(config.resetToken.ttlSeconds).toBe(1800);
    expect(config.rateLimit.credentials).toEqual({ max: 5, windowMs: 60_000 });
    expect(config.stripe.timeoutMs).toBe(10_000);
    expect(config.allowedOrigins).toEqual([]);
  });

  it("parses the fee splitting flag strictly", () => {
    expect(loadConfig({ ...baseEnv, CHECKOUT_FEE_SPLITTING: "1" }).checkout.feeSplitting).toBe(
      true
    );
    expect(problemsOf({ ...baseEnv, CHECKOUT_FEE_SPLITTING: "yes" })).toEqual([
      'Invalid CHECKOUT_FEE_SPLITTING value: "yes". Must be either "0" or "1".',
    ]);
  });

  it("rejects malformed integers", () => {
    expect(problemsOf({ ...baseEnv, PORT: "abc" })).toEqual([
      'Invalid PORT value: "abc". Must be an integer >= 1 and <= 65535.',
    ]);
  });

  it("requires a long reset secret in production", () => {
    expect(problemsOf({ ...baseEnv, NODE_ENV: "production" })).toEqual([
      "RESET_TOKEN_SECRET must be at least 32 characters in production.",
    ]);
  });

  it("splits allowed origins", () => {
    const config = loadConfig({
      ...baseEnv,
      ALLOWED_ORIGINS: "https://shop.example.com, https://admin.example.com",
    });
    expect(config.allowedOrigins).toEqual([
      "https://shop.example.com",
      "https://admin.example.com",
    ]);
  });
});

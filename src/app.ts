import express, { Express } from "express";
import helmet from "helmet";
import cors from "cors";
import path from "path";
import { apiRoutes } from "./routes";
import { webhooksRoutes } from "./routes/webhooksRoutes";
import { errorHandler } from "./middleware/errorHandler";
import { requestId, requestLogger, notFoundHandler } from "./middleware/operational";
import { ServiceContainer } from "./services";
import { IMAGES_URL_PREFIX } from "./services/ImageService";

export interface AppOptions {
  imagesDir: string;
  trustProxy: boolean;
  allowedOrigins?: string[] | undefined;
}

export function createApp(container: ServiceContainer, options: AppOptions): Express {
  const app = express();

  // req.ip keys the rate limiters; behind a proxy it must come from X-Forwarded-For
  app.set("trust proxy", options.trustProxy);
  app.disable("x-powered-by");

  // Security middleware
  app.use(
    helmet({
      hsts: {
        maxAge: 31536000,
        includeSubDomains: true,
      },
      crossOriginResourcePolicy: { policy: "cross-origin" },
    })
  );

  // CORS - any origin unless a list is configured
  app.use(
    cors({
      origin:
        options.allowedOrigins && options.allowedOrigins.length > 0
          ? options.allowedOrigins
          : true,
      methods: ["GET", "POST", "OPTIONS"],
      allowedHeaders: ["Content-Type", "x-request-id", "Stripe-Signature"],
    })
  );

  // Operational middleware
  app.use(requestId);
  app.use(requestLogger);

  // Webhook routes: raw body for signature verification
  app.use("/api/v1/webhooks", webhooksRoutes(container.fulfillmentService));

  app.use(
    express.json({
      limit: "1mb",
      strict: true,
      type: "application/json",
    })
  );
  app.use(
    express.urlencoded({
      extended: true,
      limit: "1mb",
      parameterLimit: 20,
    })
  );

  app.use(IMAGES_URL_PREFIX, express.static(path.resolve(options.imagesDir)));

  app.use("/api", apiRoutes(container));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}

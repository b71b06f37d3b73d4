// src/routes/webhooksRoutes.ts
import express, { Router } from "express";
import { createWebhookHandlers } from "../handlers/webhookHandlers";
import { FulfillmentService } from "../services/fulfillment/FulfillmentService";

/**
 * Mounted ahead of the JSON body parser: signatures are computed over the
 * exact bytes received.
 */
export function webhooksRoutes(fulfillmentService: FulfillmentService): Router {
  const router: Router = Router();
  const handlers = createWebhookHandlers(fulfillmentService);

  router.post(
    "/stripe",
    express.raw({ type: "*/*", limit: "1mb" }),
    handlers.webhook_stripe_post
  );

  return router;
}

import { NextFunction, Request, Response } from "express";
import { ApiResponse } from "../types";
import { successResponse } from "../utils/apiResponse";
import { FulfillmentService, WebhookAck } from "../services/fulfillment/FulfillmentService";
import { webhookLogger } from "../utils/logger";

export const STRIPE_SIGNATURE_HEADER = "stripe-signature";

/**
 * Signature checks need the exact bytes Stripe sent; the route mounts
 * express.raw so req.body is a Buffer here.
 */
function rawBodyOf(req: Request): Buffer | string {
  const body: unknown = req.body;
  if (Buffer.isBuffer(body)) return body;
  if (typeof body === "string") return body;

  webhookLogger.warn("Webhook body was not received as raw bytes", {
    bodyType: typeof body,
  });
  return "";
}

export function createWebhookHandlers(fulfillmentService: FulfillmentService) {
  /**
   * Stripe event notifications
   * POST /api/v1/webhooks/stripe
   */
  const webhook_stripe_post = async (
    req: Request,
    res: Response<ApiResponse<WebhookAck>>,
    next: NextFunction
  ): Promise<void> => {
    try {
      const signature = req.headers[STRIPE_SIGNATURE_HEADER];
      const ack = await fulfillmentService.handleNotification(
        rawBodyOf(req),
        typeof signature === "string" ? signature : undefined
      );
      res.status(200).json(successResponse(req, ack));
    } catch (err) {
      next(err);
    }
  };

  return { webhook_stripe_post };
}

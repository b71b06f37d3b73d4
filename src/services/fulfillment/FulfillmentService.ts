/**
 * Fulfillment Service
 *
 * Consumes Stripe webhook notifications and records the sale. Stripe
 * delivers at least once, so processing is idempotent: the listed -> sold
 * compare-and-set lets exactly one delivery change state, and every verified
 * delivery is acknowledged.
 */

import { z } from "zod";
import { ListingStore } from "../../repositories/types";
import { WebhookVerifier } from "../../utils/stripe";
import { TypedEventEmitter } from "../../utils/events";
import { InvalidSignatureError } from "../../utils/errors";
import { logWebhookEvent, webhookLogger } from "../../utils/logger";

export const CHECKOUT_COMPLETED_EVENT = "checkout.session.completed";

export type FulfillmentOutcome = "sold" | "already_sold" | "listing_not_found" | "ignored";

export interface WebhookAck {
  received: true;
  event_id: string;
  event_type: string;
  outcome: FulfillmentOutcome;
}

const completedSessionSchema = z.object({
  id: z.string().optional(),
  customer_email: z.string().nullable().optional(),
  customer_details: z
    .object({ email: z.string().nullable().optional() })
    .nullable()
    .optional(),
  metadata: z
    .object({ listing_id: z.string().min(1) })
    .passthrough()
    .nullable()
    .optional(),
});

export class FulfillmentService {
  constructor(
    private readonly listings: ListingStore,
    private readonly verifier: WebhookVerifier,
    private readonly events: TypedEventEmitter,
    private readonly clock: () => Date = () => new Date()
  ) {}

  /**
   * @throws InvalidSignatureError when the signature is absent or does not verify
   */
  async handleNotification(
    rawBody: Buffer | string,
    signature: string | undefined
  ): Promise<WebhookAck> {
    if (!signature || signature.trim() === "") {
      webhookLogger.warn("🔒 Webhook rejected: missing signature header");
      throw new InvalidSignatureError();
    }

    const event = this.verifier.verify(rawBody, signature);
    logWebhookEvent(event.type, event.id);

    const ack = (outcome: FulfillmentOutcome): WebhookAck => ({
      received: true,
      event_id: event.id,
      event_type: event.type,
      outcome,
    });

    if (event.type !== CHECKOUT_COMPLETED_EVENT) {
      webhookLogger.debug(`Ignoring webhook event type ${event.type}`, {
        eventId: event.id,
      });
      return ack("ignored");
    }

    const session = completedSessionSchema.safeParse(event.object);
    const listingId = session.success ? session.data.metadata?.listing_id : undefined;
    if (!session.success || !listingId) {
      webhookLogger.warn("Completed checkout carries no listing reference", {
        eventId: event.id,
      });
      return ack("listing_not_found");
    }

    const soldAt = this.clock();
    const result = await this.listings.markSold(listingId, soldAt);

    switch (result) {
      case "not_found":
        webhookLogger.warn("Completed checkout for a listing that no longer exists", {
          eventId: event.id,
          listingId,
        });
        return ack("listing_not_found");

      case "already_sold":
        webhookLogger.info("Duplicate completion, listing already sold", {
          eventId: event.id,
          listingId,
        });
        return ack("already_sold");

      case "sold":
        webhookLogger.info(`🏷️ Listing ${listingId} marked sold`, {
          eventId: event.id,
          listingId,
        });
        this.events.emit("listing:sold", {
          listingId,
          eventId: event.id,
          checkoutSessionId: session.data.id ?? null,
          buyerEmail:
            session.data.customer_details?.email ?? session.data.customer_email ?? null,
          soldAt,
        });
        return ack("sold");
    }
  }
}

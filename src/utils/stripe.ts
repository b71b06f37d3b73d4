import Stripe from "stripe";
import {
  InvalidSignatureError,
  PaymentProcessorError,
  PaymentProcessorErrorDetails,
} from "./errors";
import { logStripeApiCall, stripeLogger, webhookLogger } from "./logger";

export const STRIPE_API_VERSION = "2023-10-16";
export const CHECKOUT_SESSION_ID_PLACEHOLDER = "{CHECKOUT_SESSION_ID}";

export interface StripeSettings {
  secretKey: string;
  timeoutMs: number;
}

export function stripeClientConfig(settings: StripeSettings): Stripe.StripeConfig {
  return {
    apiVersion: STRIPE_API_VERSION,
    timeout: settings.timeoutMs,
    // A checkout attempt is the caller's to retry
    maxNetworkRetries: 0,
    typescript: true,
  };
}

export function createStripeClient(settings: StripeSettings): Stripe {
  return new Stripe(settings.secretKey, stripeClientConfig(settings));
}

export interface FeeSplit {
  applicationFeeAmount: number;
  destinationAccount: string;
}

export interface CheckoutSessionRequest {
  listingId: string;
  title: string;
  description: string;
  amount: number; // minor units
  currency: string;
  buyerEmail: string;
  successUrl: string;
  cancelUrl: string;
  feeSplit?: FeeSplit | undefined;
}

export interface CreatedCheckoutSession {
  id: string;
  url: string;
}

export interface PaymentGateway {
  /**
   * @throws PaymentProcessorError
   */
  createCheckoutSession(request: CheckoutSessionRequest): Promise<CreatedCheckoutSession>;
}

/**
 * A notification whose signature has been verified.
 */
export interface VerifiedWebhookEvent {
  id: string;
  type: string;
  created: number;
  object: unknown;
}

export interface WebhookVerifier {
  /**
   * @throws InvalidSignatureError
   */
  verify(rawBody: Buffer | string, signature: string): VerifiedWebhookEvent;
}

function appendQuery(url: string, query: string): string {
  const separator = url.includes("?") ? "&" : "?";
  return `${url}${separator}${query}`;
}

/**
 * The session-id placeholder must reach Stripe unencoded, so the query is
 * assembled by hand rather than through URLSearchParams.
 */
export function buildSuccessUrl(base: string, listingId: string): string {
  return appendQuery(
    base,
    `listing_id=${encodeURIComponent(listingId)}&session_id=${CHECKOUT_SESSION_ID_PLACEHOLDER}`
  );
}

export function buildCancelUrl(base: string, listingId: string): string {
  return appendQuery(base, `listing_id=${encodeURIComponent(listingId)}`);
}

export function buildCheckoutSessionParams(
  request: CheckoutSessionRequest
): Stripe.Checkout.SessionCreateParams {
  const metadata = { listing_id: request.listingId };

  const paymentIntentData: Stripe.Checkout.SessionCreateParams.PaymentIntentData = {
    metadata,
  };
  if (request.feeSplit) {
    paymentIntentData.application_fee_amount = request.feeSplit.applicationFeeAmount;
    paymentIntentData.transfer_data = {
      destination: request.feeSplit.destinationAccount,
    };
  }

  const productData: Stripe.Checkout.SessionCreateParams.LineItem.PriceData.ProductData = {
    name: request.title,
  };
  // Stripe rejects an empty description
  if (request.description.trim() !== "") {
    productData.description = request.description;
  }

  return {
    mode: "payment",
    customer_email: request.buyerEmail,
    line_items: [
      {
        price_data: {
          currency: request.currency,
          product_data: productData,
          unit_amount: request.amount,
        },
        quantity: 1,
      },
    ],
    metadata,
    payment_intent_data: paymentIntentData,
    success_url: buildSuccessUrl(request.successUrl, request.listingId),
    cancel_url: buildCancelUrl(request.cancelUrl, request.listingId),
  };
}

export function stripeErrorDetails(error: unknown): PaymentProcessorErrorDetails | undefined {
  if (error instanceof Stripe.errors.StripeError) {
    return {
      type: error.type,
      code: error.code,
      status_code: error.statusCode,
      request_id: error.requestId,
    };
  }
  return undefined;
}

export class StripePaymentGateway implements PaymentGateway {
  constructor(private readonly stripe: Stripe) {}

  async createCheckoutSession(
    request: CheckoutSessionRequest
  ): Promise<CreatedCheckoutSession> {
    const params = buildCheckoutSessionParams(request);

    let session: Stripe.Checkout.Session;
    try {
      session = await this.stripe.checkout.sessions.create(params);
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      logStripeApiCall("POST", "/v1/checkout/sessions", err);
      throw new PaymentProcessorError(
        "Payment processor request failed",
        stripeErrorDetails(error)
      );
    }

    logStripeApiCall("POST", "/v1/checkout/sessions");

    if (!session.url) {
      stripeLogger.error("Checkout session created without a redirect URL", {
        sessionId: session.id,
        listingId: request.listingId,
      });
      throw new PaymentProcessorError("Payment processor returned no checkout URL");
    }

    return { id: session.id, url: session.url };
  }
}

export class StripeWebhookVerifier implements WebhookVerifier {
  constructor(
    private readonly stripe: Stripe,
    private readonly webhookSecret: string,
    private readonly toleranceSeconds = 300
  ) {}

  verify(rawBody: Buffer | string, signature: string): VerifiedWebhookEvent {
    let event: Stripe.Event;
    try {
      event = this.stripe.webhooks.constructEvent(
        rawBody,
        signature,
        this.webhookSecret,
        this.toleranceSeconds
      );
    } catch (error) {
      webhookLogger.warn("🔒 Webhook signature verification failed", {
        reason: error instanceof Error ? error.message : String(error),
      });
      throw new InvalidSignatureError();
    }

    return {
      id: event.id,
      type: event.type,
      created: event.created,
      object: event.data.object,
    };
  }
}

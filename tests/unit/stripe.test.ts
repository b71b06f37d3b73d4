import Stripe from "stripe";
import {
  buildCheckoutSessionParams,
  CheckoutSessionRequest,
  createStripeClient,
  STRIPE_API_VERSION,
  stripeClientConfig,
  StripePaymentGateway,
  StripeWebhookVerifier,
} from "../../src/utils/stripe";
import { InvalidSignatureError, PaymentProcessorError } from "../../src/utils/errors";

const request: CheckoutSessionRequest = {
  listingId: "65a000000000000000000001",
  title: "Vintage Lamp",
  description: "Brass desk lamp",
  amount: 1999,
  currency: "usd",
  buyerEmail: "buyer@example.com",
  successUrl: "http://localhost:3000/api/v1/checkout/success",
  cancelUrl: "http://localhost:3000/api/v1/checkout/cancel",
};

describe("buildCheckoutSessionParams", () => {
  it("builds a one-item payment session with fee split", () => {
    const params = buildCheckoutSessionParams({
      ...request,
      feeSplit: { applicationFeeAmount: 123, destinationAccount: "acct_X" },
    });

    expect(params).toEqual({
      mode: "payment",
      customer_email: "buyer@example.com",
      line_items: [
        {
          price_data: {
            currency: "usd",
            product_data: { name: "Vintage Lamp", description: "Brass desk lamp" },
            unit_amount: 1999,
          },
          quantity: 1,
        },
      ],
      metadata: { listing_id: "65a000000000000000000001" },
      payment_intent_data: {
        metadata: { listing_id: "65a000000000000000000001" },
        application_fee_amount: 123,
        transfer_data: { destination: "acct_X" },
      },
      success_url:
        "http://localhost:3000/api/v1/checkout/success?listing_id=65a000000000000000000001&session_id={CHECKOUT_SESSION_ID}",
      cancel_url:
        "http://localhost:3000/api/v1/checkout/cancel?listing_id=65a000000000000000000001",
    });
  });

  it("sends no fee or transfer without a fee split", () => {
    const params = buildCheckoutSessionParams(request);
    expect(params.payment_intent_data).toEqual({
      metadata: { listing_id: "65a000000000000000000001" },
    });
  });

  it("omits an empty description", () => {
    const params = buildCheckoutSessionParams({ ...request, description: "  " });
    expect(params.line_items?.[0]?.price_data?.product_data).toEqual({ name: "Vintage Lamp" });
  });

  it("appends to URLs that already carry a query", () => {
    const params = buildCheckoutSessionParams({
      ...request,
      successUrl: "https://shop.example.com/done?src=app",
    });
    expect(params.success_url).toBe(
      "https://shop.example.com/done?src=app&listing_id=65a000000000000000000001&session_id={CHECKOUT_SESSION_ID}"
    );
  });
});

describe("StripePaymentGateway", () => {
  const stripe = createStripeClient({ secretKey: "sk_test_placeholder", timeoutMs: 1000 });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it("turns processor failures into PaymentProcessorError", async () => {
    jest
      .spyOn(stripe.checkout.sessions, "create")
      .mockRejectedValue(new Error("connect ECONNREFUSED"));

    const gateway = new StripePaymentGateway(stripe);
    await expect(gateway.createCheckoutSession(request)).rejects.toBeInstanceOf(
      PaymentProcessorError
    );
  });
});

describe("StripeWebhookVerifier", () => {
  const secret = "whsec_test_secret";
  const stripe = createStripeClient({ secretKey: "sk_test_placeholder", timeoutMs: 1000 });
  const verifier = new StripeWebhookVerifier(stripe, secret, 300);
  const payload = JSON.stringify({
    id: "evt_1",
    object: "event",
    type: "checkout.session.completed",
    created: 1700000000,
    data: { object: { id: "cs_1", metadata: { listing_id: "l1" } } },
  });

  it("returns the verified event", () => {
    const signature = stripe.webhooks.generateTestHeaderString({ payload, secret });

    expect(verifier.verify(Buffer.from(payload), signature)).toEqual({
      id: "evt_1",
      type: "checkout.session.completed",
      created: 1700000000,
      object: { id: "cs_1", metadata: { listing_id: "l1" } },
    });
  });

  it("rejects a body changed after signing", () => {
    const signature = stripe.webhooks.generateTestHeaderString({ payload, secret });
    const tampered = payload.replace('"l1"', '"l2"');

    expect(() => verifier.verify(Buffer.from(tampered), signature)).toThrow(InvalidSignatureError);
  });

  it("rejects a signature made with another secret", () => {
    const signature = stripe.webhooks.generateTestHeaderString({
      payload,
      secret: "whsec_other",
    });

    expect(() => verifier.verify(payload, signature)).toThrow(InvalidSignatureError);
  });

  it("rejects a timestamp outside the tolerance", () => {
    const signature = stripe.webhooks.generateTestHeaderString({
      payload,
      secret,
      timestamp: Math.floor(Date.now() / 1000) - 301 - 60,
    });

    expect(() => verifier.verify(payload, signature)).toThrow(InvalidSignatureError);
  });

  it("rejects a header in the wrong format", () => {
    expect(() => verifier.verify(payload, "garbage")).toThrow(InvalidSignatureError);
  });
});

describe("createStripeClient", () => {
  it("bounds each request by the configured timeout and never retries", () => {
    expect(stripeClientConfig({ secretKey: "sk_test_placeholder", timeoutMs: 2500 })).toEqual({
      apiVersion: STRIPE_API_VERSION,
      timeout: 2500,
      maxNetworkRetries: 0,
      typescript: true,
    });
  });

  it("returns an SDK client", () => {
    expect(createStripeClient({ secretKey: "sk_test_placeholder", timeoutMs: 1000 })).toBeInstanceOf(
      Stripe
    );
  });
});

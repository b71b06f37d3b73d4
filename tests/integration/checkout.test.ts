import request from "supertest";
import { buildTestHarness, TestFactory, TestHarness } from "../helpers/TestFactory";
import { PaymentProcessorError } from "../../src/utils/errors";

describe("Checkout routes", () => {
  let harness: TestHarness;
  let listingId: string;

  beforeEach(async () => {
    harness = buildTestHarness({}, () => 1_700_000_000_000);
    const seller = await TestFactory.createAccount(harness.accounts);
    const listing = await TestFactory.createListing(harness.listings, seller.id);
    listingId = listing.id;
  });

  const startCheckout = (body: Record<string, string>) =>
    request(harness.app).post("/api/v1/checkout").send(body);

  it("creates a hosted checkout session", async () => {
    const res = await startCheckout({ listing_id: listingId, buyer_email: "buyer@example.com" });

    expect(res.status).toBe(200);
    expect(res.body.data).toEqual({
      checkout_url: "https://checkout.stripe.test/pay/cs_test_1",
      session_id: "cs_test_1",
      listing_id: listingId,
      amount: 1999,
      currency: "usd",
    });

    expect(harness.gateway.requests).toHaveLength(1);
    expect(harness.gateway.requests[0]).toMatchObject({
      listingId,
      amount: 1999,
      buyerEmail: "buyer@example.com",
      feeSplit: { applicationFeeAmount: 123, destinationAccount: "acct_X" },
    });
  });

  it("refuses a sold listing", async () => {
    await harness.listings.markSold(listingId, new Date());

    const res = await startCheckout({ listing_id: listingId, buyer_email: "buyer@example.com" });

    expect(res.status).toBe(409);
    expect(res.body.error).toEqual({
      message: "Listing already sold",
      code: "ALREADY_SOLD",
      details: { listing_id: listingId },
    });
    expect(harness.gateway.requests).toHaveLength(0);
  });

  it("returns 404 for an unknown listing", async () => {
    const res = await startCheckout({
      listing_id: "ffffffffffffffffffffffff",
      buyer_email: "buyer@example.com",
    });

    expect(res.status).toBe(404);
    expect(res.body.error.code).toBe("NOT_FOUND");
  });

  it("rejects a listing priced at the platform fee", async () => {
    const seller = await TestFactory.createAccount(harness.accounts);
    const cheap = await TestFactory.createListing(harness.listings, seller.id, { price: 1.23 });

    const res = await startCheckout({ listing_id: cheap.id, buyer_email: "buyer@example.com" });

    expect(res.status).toBe(400);
    expect(res.body.error).toEqual({
      message: "Listing price does not cover the platform fee",
      code: "PRICE_BELOW_PLATFORM_FEE",
      details: { listing_id: cheap.id, amount: 123, platform_fee: 123 },
    });
    expect(harness.gateway.requests).toHaveLength(0);
  });

  it("maps gateway failures to 502", async () => {
    harness.gateway.failWith = new PaymentProcessorError("Payment processor request failed");

    const res = await startCheckout({ listing_id: listingId, buyer_email: "buyer@example.com" });

    expect(res.status).toBe(502);
    expect(res.body.error.code).toBe("PAYMENT_PROCESSOR_ERROR");
  });

  it("validates the buyer email", async () => {
    const res = await startCheckout({ listing_id: listingId, buyer_email: "not-an-email" });

    expect(res.status).toBe(400);
    expect(res.body.error.details).toEqual([
      { path: "body.buyer_email", field: "buyer_email", message: "buyer_email must be a valid email" },
    ]);
  });

  it("renders the success landing page", async () => {
    const res = await request(harness.app)
      .get("/api/v1/checkout/success")
      .query({ listing_id: listingId, session_id: "cs_test_1" });

    expect(res.status).toBe(200);
    expect(res.body.data).toEqual({ status: "success", listing_id: listingId, session_id: "cs_test_1" });
  });

  it("validates the landing page query", async () => {
    const res = await request(harness.app).get(
      "/api/v1/checkout/success?listing_id=a&listing_id=b"
    );

    expect(res.status).toBe(400);
    expect(res.body.error.code).toBe("VALIDATION_ERROR");
    expect(res.body.error.details[0]).toMatchObject({ path: "query.listing_id", field: "listing_id" });
  });

  it("renders the cancel landing page", async () => {
    const res = await request(harness.app).get("/api/v1/checkout/cancel");

    expect(res.status).toBe(200);
    expect(res.body.data).toEqual({ status: "cancelled", listing_id: null });
    expect(res.body.message).toBe("Checkout cancelled. The listing is still available.");
  });
});

import { FulfillmentService } from "../../../src/services/fulfillment/FulfillmentService";
import { StripeWebhookVerifier } from "../../../src/utils/stripe";
import { TypedEventEmitter } from "../../../src/utils/events";
import { InvalidSignatureError } from "../../../src/utils/errors";
import { InMemoryAccountStore, InMemoryListingStore } from "../../helpers/fakes";
import { TEST_WEBHOOK_SECRET, TestFactory, testStripe } from "../../helpers/TestFactory";

describe("FulfillmentService", () => {
  const soldAt = new Date("2026-01-15T12:00:00.000Z");
  let listings: InMemoryListingStore;
  let events: TypedEventEmitter;
  let onSold: jest.Mock;
  let service: FulfillmentService;
  let listingId: string;

  beforeEach(async () => {
    listings = new InMemoryListingStore();
    events = new TypedEventEmitter();
    onSold = jest.fn();
    events.on("listing:sold", onSold);
    service = new FulfillmentService(
      listings,
      new StripeWebhookVerifier(testStripe, TEST_WEBHOOK_SECRET),
      events,
      () => soldAt
    );

    const seller = await TestFactory.createAccount(new InMemoryAccountStore());
    listingId = (await TestFactory.createListing(listings, seller.id)).id;
  });

  const deliver = (payload: string) =>
    service.handleNotification(Buffer.from(payload), TestFactory.signatureFor(payload));

  it("marks the listing sold on a completed checkout", async () => {
    const payload = TestFactory.checkoutCompletedEvent(listingId, "evt_1");

    await expect(deliver(payload)).resolves.toEqual({
      received: true,
      event_id: "evt_1",
      event_type: "checkout.session.completed",
      outcome: "sold",
    });

    const listing = await listings.findById(listingId);
    expect(listing?.status).toBe("sold");
    expect(listing?.sold_at).toEqual(soldAt);
    expect(onSold).toHaveBeenCalledWith({
      listingId,
      eventId: "evt_1",
      checkoutSessionId: "cs_test_1",
      buyerEmail: "buyer@example.com",
      soldAt,
    });
  });

  it("acknowledges a duplicate delivery without a second change", async () => {
    const payload = TestFactory.checkoutCompletedEvent(listingId, "evt_1");

    const first = await deliver(payload);
    const second = await deliver(payload);

    expect(first.outcome).toBe("sold");
    expect(second.outcome).toBe("already_sold");
    expect(onSold).toHaveBeenCalledTimes(1);
  });

  it("rejects a missing signature before reading the body", async () => {
    const payload = TestFactory.checkoutCompletedEvent(listingId);

    await expect(service.handleNotification(payload, undefined)).rejects.toBeInstanceOf(
      InvalidSignatureError
    );
    await expect(service.handleNotification(payload, "  ")).rejects.toBeInstanceOf(
      InvalidSignatureError
    );
    expect(listings.markSoldCalls).toBe(0);
  });

  it("rejects a tampered body before any listing lookup", async () => {
    const other = await listings.create({
      title: "Other",
      description: "",
      price: 5,
      seller_id: "65a000000000000000000001",
      image_path: "other.jpg",
    });
    const payload = TestFactory.checkoutCompletedEvent(listingId);
    const signature = TestFactory.signatureFor(payload);
    const tampered = payload.replace(listingId, other.id);

    await expect(
      service.handleNotification(Buffer.from(tampered), signature)
    ).rejects.toBeInstanceOf(InvalidSignatureError);
    expect(listings.markSoldCalls).toBe(0);
    expect((await listings.findById(other.id))?.status).toBe("listed");
  });

  it("acknowledges a completed checkout for a deleted listing without mutating anything", async () => {
    listings.listings.delete(listingId);
    const before = await listings.list();

    const ack = await deliver(TestFactory.checkoutCompletedEvent(listingId));

    expect(ack.outcome).toBe("listing_not_found");
    expect(await listings.list()).toEqual(before);
    expect(onSold).not.toHaveBeenCalled();
  });

  it("acknowledges a completed checkout without listing metadata", async () => {
    const ack = await deliver(TestFactory.checkoutCompletedEvent(null));

    expect(ack.outcome).toBe("listing_not_found");
    expect(listings.markSoldCalls).toBe(0);
  });

  it("ignores other event types", async () => {
    const ack = await deliver(
      TestFactory.checkoutCompletedEvent(listingId, "evt_2", "payment_intent.succeeded")
    );

    expect(ack).toEqual({
      received: true,
      event_id: "evt_2",
      event_type: "payment_intent.succeeded",
      outcome: "ignored",
    });
    expect(listings.markSoldCalls).toBe(0);
    expect((await listings.findById(listingId))?.status).toBe("listed");
  });
});

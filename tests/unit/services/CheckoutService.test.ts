import { CheckoutService, CheckoutOptions } from "../../../src/services/checkout/CheckoutService";
import {
  AlreadySoldError,
  NotFoundError,
  PaymentProcessorError,
  PriceBelowPlatformFeeError,
  SellerNotPayableError,
} from "../../../src/utils/errors";
import {
  FakePaymentGateway,
  InMemoryAccountStore,
  InMemoryListingStore,
} from "../../helpers/fakes";
import { TestFactory } from "../../helpers/TestFactory";

const options = (feeSplitting: boolean): CheckoutOptions => ({
  currency: "usd",
  successUrl: "http://localhost:3000/api/v1/checkout/success",
  cancelUrl: "http://localhost:3000/api/v1/checkout/cancel",
  feeSplit: { enabled: feeSplitting, platformFeeCents: 123 },
});

describe("CheckoutService", () => {
  let accounts: InMemoryAccountStore;
  let listings: InMemoryListingStore;
  let gateway: FakePaymentGateway;
  let service: CheckoutService;

  beforeEach(() => {
    accounts = new InMemoryAccountStore();
    listings = new InMemoryListingStore();
    gateway = new FakePaymentGateway();
    service = new CheckoutService(listings, accounts, gateway, options(true));
  });

  it("creates a session for a listed item and returns the redirect", async () => {
    const seller = await TestFactory.createAccount(accounts);
    const listing = await TestFactory.createListing(listings, seller.id, { price: 19.99 });

    const redirect = await service.createCheckout(listing.id, "buyer@example.com");

    expect(redirect).toEqual({
      checkout_url: "https://checkout.stripe.test/pay/cs_test_1",
      session_id: "cs_test_1",
      listing_id: listing.id,
      amount: 1999,
      currency: "usd",
    });
    expect(gateway.requests).toEqual([
      {
        listingId: listing.id,
        title: "Vintage Lamp",
        description: "Brass desk lamp",
        amount: 1999,
        currency: "usd",
        buyerEmail: "buyer@example.com",
        successUrl: "http://localhost:3000/api/v1/checkout/success",
        cancelUrl: "http://localhost:3000/api/v1/checkout/cancel",
        feeSplit: { applicationFeeAmount: 123, destinationAccount: "acct_X" },
      },
    ]);
  });

  it("leaves the listing untouched", async () => {
    const seller = await TestFactory.createAccount(accounts);
    const listing = await TestFactory.createListing(listings, seller.id);

    await service.createCheckout(listing.id, "buyer@example.com");

    expect((await listings.findById(listing.id))?.status).toBe("listed");
  });

  it("creates an independent session on every call", async () => {
    const seller = await TestFactory.createAccount(accounts);
    const listing = await TestFactory.createListing(listings, seller.id);

    const first = await service.createCheckout(listing.id, "a@example.com");
    const second = await service.createCheckout(listing.id, "b@example.com");

    expect(first.session_id).toBe("cs_test_1");
    expect(second.session_id).toBe("cs_test_2");
  });

  it("rejects a sold listing without calling the processor", async () => {
    const seller = await TestFactory.createAccount(accounts);
    const listing = await TestFactory.createListing(listings, seller.id);
    await listings.markSold(listing.id, new Date());

    await expect(service.createCheckout(listing.id, "buyer@example.com")).rejects.toBeInstanceOf(
      AlreadySoldError
    );
    expect(gateway.requests).toHaveLength(0);
  });

  it("rejects an unknown listing", async () => {
    await expect(
      service.createCheckout("65a0000000000000000000ff", "buyer@example.com")
    ).rejects.toBeInstanceOf(NotFoundError);
  });

  it("requires a payable seller when splitting fees", async () => {
    const seller = await TestFactory.createAccount(accounts, { stripe_account_id: null });
    const listing = await TestFactory.createListing(listings, seller.id);

    await expect(service.createCheckout(listing.id, "buyer@example.com")).rejects.toBeInstanceOf(
      SellerNotPayableError
    );
    expect(gateway.requests).toHaveLength(0);
  });

  it("rejects a price that does not exceed the platform fee", async () => {
    const seller = await TestFactory.createAccount(accounts);
    const listing = await TestFactory.createListing(listings, seller.id, { price: 1.23 });

    const error = await service.createCheckout(listing.id, "buyer@example.com").catch((e: unknown) => e);

    expect(error).toBeInstanceOf(PriceBelowPlatformFeeError);
    expect(error).toMatchObject({
      statusCode: 400,
      code: "PRICE_BELOW_PLATFORM_FEE",
      details: { listing_id: listing.id, amount: 123, platform_fee: 123 },
    });
    expect(gateway.requests).toHaveLength(0);
  });

  it("accepts a price one cent above the platform fee", async () => {
    const seller = await TestFactory.createAccount(accounts);
    const listing = await TestFactory.createListing(listings, seller.id, { price: 1.24 });

    const redirect = await service.createCheckout(listing.id, "buyer@example.com");

    expect(redirect.amount).toBe(124);
    expect(gateway.requests[0]?.feeSplit).toEqual({
      applicationFeeAmount: 123,
      destinationAccount: "acct_X",
    });
  });

  it("ignores the platform fee when fee splitting is off", async () => {
    service = new CheckoutService(listings, accounts, gateway, options(false));
    const seller = await TestFactory.createAccount(accounts);
    const listing = await TestFactory.createListing(listings, seller.id, { price: 1 });

    await expect(service.createCheckout(listing.id, "buyer@example.com")).resolves.toMatchObject({
      amount: 100,
    });
  });

  it("charges the platform directly when fee splitting is off", async () => {
    service = new CheckoutService(listings, accounts, gateway, options(false));
    const seller = await TestFactory.createAccount(accounts, { stripe_account_id: null });
    const listing = await TestFactory.createListing(listings, seller.id);

    await service.createCheckout(listing.id, "buyer@example.com");

    expect(gateway.requests[0]?.feeSplit).toBeUndefined();
  });

  it("surfaces processor failures and writes nothing", async () => {
    const seller = await TestFactory.createAccount(accounts);
    const listing = await TestFactory.createListing(listings, seller.id);
    gateway.failWith = new PaymentProcessorError("Payment processor request failed");

    await expect(service.createCheckout(listing.id, "buyer@example.com")).rejects.toBeInstanceOf(
      PaymentProcessorError
    );
    expect((await listings.findById(listing.id))?.status).toBe("listed");
  });
});

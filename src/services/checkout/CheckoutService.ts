/**
 * Checkout Service
 *
 * Turns a purchase intent into a hosted Stripe Checkout session.
 *
 * Key rules:
 * - Listing must exist and still be "listed"
 * - With fee splitting on, the seller must have a connected payout account;
 *   the platform keeps a fixed application fee and the rest goes to the seller,
 *   so the price must exceed that fee
 * - Nothing is written locally; the sale is recorded only by the webhook
 */

import { AccountStore, ListingStore } from "../../repositories/types";
import { assertPurchasable } from "../../utils/listingStatusMachine";
import { toMinorUnits } from "../../utils/money";
import { FeeSplit, PaymentGateway } from "../../utils/stripe";
import {
  NotFoundError,
  PriceBelowPlatformFeeError,
  SellerNotPayableError,
} from "../../utils/errors";
import { checkoutLogger } from "../../utils/logger";

export interface CheckoutOptions {
  currency: string;
  successUrl: string;
  cancelUrl: string;
  feeSplit: {
    enabled: boolean;
    platformFeeCents: number;
  };
}

export interface CheckoutRedirect {
  checkout_url: string;
  session_id: string;
  listing_id: string;
  amount: number;
  currency: string;
}

export class CheckoutService {
  constructor(
    private readonly listings: ListingStore,
    private readonly accounts: AccountStore,
    private readonly gateway: PaymentGateway,
    private readonly options: CheckoutOptions
  ) {}

  async createCheckout(listingId: string, buyerEmail: string): Promise<CheckoutRedirect> {
    const listing = await this.listings.findById(listingId);
    if (!listing) {
      throw new NotFoundError("Listing not found");
    }
    assertPurchasable(listing);

    const amount = toMinorUnits(listing.price);
    const feeSplit = this.options.feeSplit.enabled
      ? await this.resolveFeeSplit(listing.id, listing.seller_id, amount)
      : undefined;

    checkoutLogger.info("💳 Creating checkout session", {
      listingId: listing.id,
      amount,
      currency: this.options.currency,
      feeSplit: feeSplit !== undefined,
    });

    const session = await this.gateway.createCheckoutSession({
      listingId: listing.id,
      title: listing.title,
      description: listing.description,
      amount,
      currency: this.options.currency,
      buyerEmail,
      successUrl: this.options.successUrl,
      cancelUrl: this.options.cancelUrl,
      feeSplit,
    });

    checkoutLogger.info("✅ Checkout session created", {
      listingId: listing.id,
      sessionId: session.id,
    });

    return {
      checkout_url: session.url,
      session_id: session.id,
      listing_id: listing.id,
      amount,
      currency: this.options.currency,
    };
  }

  private async resolveFeeSplit(
    listingId: string,
    sellerId: string,
    amount: number
  ): Promise<FeeSplit> {
    const platformFee = this.options.feeSplit.platformFeeCents;
    if (amount <= platformFee) {
      checkoutLogger.warn("Listing price does not cover the platform fee", {
        listingId,
        amount,
        platformFee,
      });
      throw new PriceBelowPlatformFeeError(listingId, amount, platformFee);
    }

    const seller = await this.accounts.findById(sellerId);
    if (!seller?.stripe_account_id) {
      checkoutLogger.warn("Seller has no connected payout account", {
        listingId,
        sellerId,
      });
      throw new SellerNotPayableError(listingId);
    }

    return {
      applicationFeeAmount: platformFee,
      destinationAccount: seller.stripe_account_id,
    };
  }
}

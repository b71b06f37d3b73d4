/**
 * Services Index - Dependency Injection Container
 *
 * Wires services to their stores and external clients. Production code calls
 * `buildContainer(config)`; tests pass overrides for the stores, gateway,
 * verifier, mailer and clocks.
 */

import type Stripe from "stripe";
import { Config } from "../config";
import { AccountStore, ListingStore, userRepository, listingRepository } from "../repositories";
import { SlidingWindowRateLimiter } from "./rateLimit/RateLimiter";
import { ResetTokenService } from "./passwordReset/ResetTokenService";
import { PasswordResetService } from "./passwordReset/PasswordResetService";
import { CheckoutService } from "./checkout/CheckoutService";
import { FulfillmentService } from "./fulfillment/FulfillmentService";
import { ListingService } from "./listing/ListingService";
import { UserService } from "./user/UserService";
import { ImageStore, LocalImageStore } from "./ImageService";
import {
  createStripeClient,
  PaymentGateway,
  StripePaymentGateway,
  StripeWebhookVerifier,
  WebhookVerifier,
} from "../utils/stripe";
import { ResetMailer, SmtpResetMailer } from "../utils/mailer";
import { BcryptPasswordHasher, PasswordHasher } from "../utils/password";
import { TypedEventEmitter, events as sharedEvents } from "../utils/events";

export interface ServiceContainer {
  events: TypedEventEmitter;
  limiters: {
    credentials: SlidingWindowRateLimiter;
    checkout: SlidingWindowRateLimiter;
  };
  userService: UserService;
  passwordResetService: PasswordResetService;
  listingService: ListingService;
  checkoutService: CheckoutService;
  fulfillmentService: FulfillmentService;
}

export interface ContainerOverrides {
  accounts?: AccountStore;
  listings?: ListingStore;
  gateway?: PaymentGateway;
  verifier?: WebhookVerifier;
  mailer?: ResetMailer;
  hasher?: PasswordHasher;
  images?: ImageStore;
  events?: TypedEventEmitter;
  clock?: () => number;
}

export function buildContainer(
  config: Config,
  overrides: ContainerOverrides = {}
): ServiceContainer {
  const clock = overrides.clock ?? Date.now;
  const accounts = overrides.accounts ?? userRepository;
  const listings = overrides.listings ?? listingRepository;
  const events = overrides.events ?? sharedEvents;
  const hasher = overrides.hasher ?? new BcryptPasswordHasher(config.bcryptRounds);
  const images = overrides.images ?? new LocalImageStore(config.imagesDir);
  const mailer =
    overrides.mailer ?? new SmtpResetMailer(config.smtp, config.resetToken.resetUrlBase);

  let stripe: Stripe | undefined;
  const stripeClient = (): Stripe => (stripe ??= createStripeClient(config.stripe));
  const gateway = overrides.gateway ?? new StripePaymentGateway(stripeClient());
  const verifier =
    overrides.verifier ??
    new StripeWebhookVerifier(
      stripeClient(),
      config.stripe.webhookSecret,
      config.stripe.webhookToleranceSeconds
    );

  const tokens = new ResetTokenService({
    secret: config.resetToken.secret,
    ttlSeconds: config.resetToken.ttlSeconds,
    clock,
  });

  return {
    events,
    limiters: {
      credentials: new SlidingWindowRateLimiter({ ...config.rateLimit.credentials, clock }),
      checkout: new SlidingWindowRateLimiter({ ...config.rateLimit.checkout, clock }),
    },
    userService: new UserService(accounts, hasher, events),
    passwordResetService: new PasswordResetService(accounts, tokens, hasher, mailer, events),
    listingService: new ListingService(listings, accounts, images),
    checkoutService: new CheckoutService(listings, accounts, gateway, {
      currency: config.checkout.currency,
      successUrl: config.checkout.successUrl,
      cancelUrl: config.checkout.cancelUrl,
      feeSplit: {
        enabled: config.checkout.feeSplitting,
        platformFeeCents: config.checkout.platformFeeCents,
      },
    }),
    fulfillmentService: new FulfillmentService(
      listings,
      verifier,
      events,
      () => new Date(clock())
    ),
  };
}

export { TypedEventEmitter } from "../utils/events";

/**
 * Event Handler Registration
 *
 * Bootstraps the side-effect listeners for domain events. Called once during
 * server startup.
 */

import { TypedEventEmitter } from "../utils/events";
import logger, { authLogger, checkoutLogger } from "../utils/logger";

export function registerEventHandlers(events: TypedEventEmitter): void {
  logger.info("Registering system event handlers...");

  /**
   * Sale audit trail
   */
  events.on("listing:sold", ({ listingId, eventId, checkoutSessionId, soldAt }) => {
    checkoutLogger.info(`🎉 Sale recorded for listing ${listingId}`, {
      listingId,
      eventId,
      checkoutSessionId,
      soldAt: soldAt.toISOString(),
    });
  });

  events.on("account:registered", ({ accountId, username }) => {
    authLogger.info(`New account ${username}`, { accountId });
  });

  /**
   * Credential change audit trail
   */
  events.on("account:password_reset", ({ accountId, username }) => {
    authLogger.info(`🔑 Password changed for ${username}`, { accountId });
  });

  logger.info("✅ Event handlers registered");
}

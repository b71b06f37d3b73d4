/**
 * Password Reset Service
 *
 * Forgot-password issues a token bound to the account's current credential
 * version and mails the link. Reset-password swaps the hash with a
 * compare-and-set on that version, so each token works at most once and any
 * successful reset voids every other outstanding token for the account.
 */

import { AccountStore } from "../../repositories/types";
import { ResetTokenService } from "./ResetTokenService";
import { PasswordHasher } from "../../utils/password";
import { ResetMailer } from "../../utils/mailer";
import { TypedEventEmitter } from "../../utils/events";
import {
  InvalidResetTokenError,
  MessagingError,
  NotFoundError,
  ValidationError,
} from "../../utils/errors";
import { authLogger, logAccountOperation } from "../../utils/logger";

export class PasswordResetService {
  constructor(
    private readonly accounts: AccountStore,
    private readonly tokens: ResetTokenService,
    private readonly hasher: PasswordHasher,
    private readonly mailer: ResetMailer,
    private readonly events: TypedEventEmitter
  ) {}

  async requestReset(username: string): Promise<void> {
    const account = await this.accounts.findByUsername(username);
    if (!account) {
      throw new NotFoundError("User not found");
    }
    if (!account.email) {
      throw new ValidationError("No email on file for this account");
    }

    const token = this.tokens.issue(account.username, account.credential_version);

    try {
      await this.mailer.sendResetLink({
        username: account.username,
        to: account.email,
        token,
      });
    } catch (error) {
      authLogger.error("Failed to send reset email", {
        username: account.username,
        error: error instanceof Error ? error.message : error,
      });
      throw new MessagingError("Failed to send reset email");
    }

    logAccountOperation("reset requested", account.username);
  }

  async resetPassword(token: string, newPassword: string): Promise<void> {
    const claims = this.tokens.verifyClaims(token);
    if (!claims) {
      throw new InvalidResetTokenError();
    }

    const account = await this.accounts.findByUsername(claims.username);
    if (!account || account.credential_version !== claims.credentialVersion) {
      authLogger.warn("Reset token no longer matches the account", {
        username: claims.username,
        accountExists: account !== null,
      });
      throw new InvalidResetTokenError();
    }

    const hashed = await this.hasher.hash(newPassword);
    const updated = await this.accounts.updateCredential(
      account.id,
      claims.credentialVersion,
      hashed
    );
    // Lost the race to a concurrent reset with the same token
    if (!updated) {
      throw new InvalidResetTokenError();
    }

    logAccountOperation("password reset", updated.username, {
      credentialVersion: updated.credential_version,
    });
    this.events.emit("account:password_reset", {
      accountId: updated.id,
      username: updated.username,
    });
  }
}

/**
 * Store contracts the services depend on. The Mongo repositories implement
 * them; tests substitute in-memory versions.
 */

import { ListingStatus } from "../models/Listing";

export interface AccountRecord {
  id: string;
  username: string;
  hashed_password: string;
  email: string | null;
  stripe_account_id: string | null;
  credential_version: number;
  created_at: Date;
}

export interface NewAccount {
  username: string;
  hashed_password: string;
  email: string | null;
  stripe_account_id: string | null;
}

export interface ListingRecord {
  id: string;
  title: string;
  description: string;
  price: number;
  seller_id: string;
  image_path: string;
  status: ListingStatus;
  sold_at: Date | null;
  created_at: Date;
}

export interface NewListing {
  title: string;
  description: string;
  price: number;
  seller_id: string;
  image_path: string;
}

/**
 * Result of the listed -> sold compare-and-set.
 */
export type MarkSoldOutcome = "sold" | "already_sold" | "not_found";

export interface AccountStore {
  findById(id: string): Promise<AccountRecord | null>;
  findByUsername(username: string): Promise<AccountRecord | null>;
  findByIds(ids: string[]): Promise<AccountRecord[]>;
  create(input: NewAccount): Promise<AccountRecord>;
  /**
   * Replaces the credential hash only while the stored credential version
   * still equals `expectedVersion`, and bumps the version. Resolves null when
   * the account is gone or the version moved on.
   */
  updateCredential(
    id: string,
    expectedVersion: number,
    hashedPassword: string
  ): Promise<AccountRecord | null>;
}

export interface ListingStore {
  findById(id: string): Promise<ListingRecord | null>;
  list(): Promise<ListingRecord[]>;
  create(input: NewListing): Promise<ListingRecord>;
  markSold(id: string, soldAt: Date): Promise<MarkSoldOutcome>;
}

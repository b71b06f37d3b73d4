/**
 * Repository Index
 *
 * Exports all repository instances as singletons.
 * These are injected into services via the container.
 */

export { BaseRepository } from "./base/BaseRepository";
export { userRepository, UserRepository } from "./UserRepository";
export { listingRepository, ListingRepository } from "./ListingRepository";
export type {
  AccountRecord,
  AccountStore,
  ListingRecord,
  ListingStore,
  MarkSoldOutcome,
  NewAccount,
  NewListing,
} from "./types";

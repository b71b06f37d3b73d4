// src/utils/listingStatusMachine.ts
import { ListingStatus } from "../models/Listing";
import { AlreadySoldError } from "./errors";

/**
 * Next statuses reachable from each status. "sold" is terminal; the single
 * sale transition is applied by the repository's compare-and-set.
 */
const NEXT_STATUSES: Record<ListingStatus, readonly ListingStatus[]> = {
  listed: ["sold"],
  sold: [],
};

/**
 * Staying in the same status is not a transition
 */
export function isValidTransition(from: ListingStatus, to: ListingStatus): boolean {
  return NEXT_STATUSES[from].includes(to);
}

export function isSold(listing: { status: ListingStatus }): boolean {
  return listing.status === "sold";
}

/**
 * Checkout may only start from "listed"
 * @throws AlreadySoldError
 */
export function assertPurchasable(listing: { id: string; status: ListingStatus }): void {
  if (!isValidTransition(listing.status, "sold")) {
    throw new AlreadySoldError(listing.id);
  }
}

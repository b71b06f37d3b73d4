/**
 * Listing Service
 *
 * Listing creation and the public catalogue. Sale state is never changed
 * here; see FulfillmentService.
 */

import { AccountStore, ListingRecord, ListingStore } from "../../repositories/types";
import { ImageStore, imageUrl } from "../ImageService";
import { ListingStatus } from "../../models/Listing";
import { isSold } from "../../utils/listingStatusMachine";
import { ValidationError } from "../../utils/errors";
import logger from "../../utils/logger";

export const UNKNOWN_SELLER = "Unknown";

export interface CreateListingParams {
  title: string;
  description: string;
  price: number;
  seller_id: string;
  image: {
    originalName: string;
    data: Buffer;
  };
}

export interface ListingView {
  id: string;
  title: string;
  description: string;
  price: number;
  seller_id: string;
  seller_username: string;
  image_url: string;
  status: ListingStatus;
  sold: boolean;
  sold_at: Date | null;
  created_at: Date;
}

export class ListingService {
  constructor(
    private readonly listings: ListingStore,
    private readonly accounts: AccountStore,
    private readonly images: ImageStore
  ) {}

  async create(params: CreateListingParams): Promise<ListingView> {
    const seller = await this.accounts.findById(params.seller_id);
    if (!seller) {
      throw new ValidationError("Invalid seller_id");
    }

    const image = await this.images.save(params.image.originalName, params.image.data);

    const listing = await this.listings.create({
      title: params.title,
      description: params.description,
      price: params.price,
      seller_id: seller.id,
      image_path: image.path,
    });

    logger.info(`📦 Listing created: ${listing.id}`, {
      listingId: listing.id,
      sellerId: seller.id,
    });

    return this.toView(listing, seller.username);
  }

  /**
   * All listings, newest first, with seller usernames resolved in one query
   */
  async list(): Promise<ListingView[]> {
    const listings = await this.listings.list();
    const sellerIds = [...new Set(listings.map((listing) => listing.seller_id))];
    const sellers = await this.accounts.findByIds(sellerIds);
    const usernames = new Map(sellers.map((seller) => [seller.id, seller.username]));

    return listings.map((listing) =>
      this.toView(listing, usernames.get(listing.seller_id) ?? UNKNOWN_SELLER)
    );
  }

  private toView(listing: ListingRecord, sellerUsername: string): ListingView {
    return {
      id: listing.id,
      title: listing.title,
      description: listing.description,
      price: listing.price,
      seller_id: listing.seller_id,
      seller_username: sellerUsername,
      image_url: imageUrl(listing.image_path),
      status: listing.status,
      sold: isSold(listing),
      sold_at: listing.sold_at,
      created_at: listing.created_at,
    };
  }
}

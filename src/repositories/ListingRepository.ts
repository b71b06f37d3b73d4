/**
 * Listing Repository
 *
 * Data access layer for listings. The only mutation after creation is the
 * sale flag, applied as a compare-and-set on `status`.
 */

import { BaseRepository } from "./base/BaseRepository";
import { Listing, IListing } from "../models/Listing";
import { ListingRecord, ListingStore, MarkSoldOutcome, NewListing } from "./types";

export class ListingRepository
  extends BaseRepository<IListing, ListingRecord>
  implements ListingStore
{
  constructor() {
    super(Listing);
  }

  protected toRecord(doc: IListing): ListingRecord {
    return {
      id: doc._id.toString(),
      title: doc.title,
      description: doc.description,
      price: doc.price,
      seller_id: doc.seller_id.toString(),
      image_path: doc.image_path,
      status: doc.status,
      sold_at: doc.sold_at ?? null,
      created_at: doc.createdAt,
    };
  }

  async findById(id: string): Promise<ListingRecord | null> {
    if (!this.isValidId(id)) return null;
    const doc = await this.run("findById", { id }, () =>
      this.model.findById(this.toObjectId(id)).lean<IListing>().exec()
    );
    return doc ? this.toRecord(doc) : null;
  }

  /**
   * All listings, newest first
   */
  async list(): Promise<ListingRecord[]> {
    const docs = await this.run("list", {}, () =>
      this.model.find({}).sort({ createdAt: -1 }).lean<IListing[]>().exec()
    );
    return docs.map((doc) => this.toRecord(doc));
  }

  async create(input: NewListing): Promise<ListingRecord> {
    const doc = await this.run("create", { seller_id: input.seller_id }, () =>
      this.model.create({
        title: input.title,
        description: input.description,
        price: input.price,
        seller_id: this.toObjectId(input.seller_id),
        image_path: input.image_path,
        status: "listed",
      })
    );
    return this.toRecord(doc);
  }

  /**
   * listed -> sold, applied atomically. Only the request whose update matches
   * `status: "listed"` observes "sold"; every later call sees "already_sold".
   */
  async markSold(id: string, soldAt: Date): Promise<MarkSoldOutcome> {
    if (!this.isValidId(id)) return "not_found";

    const updated = await this.run("markSold", { id }, () =>
      this.model
        .findOneAndUpdate(
          { _id: this.toObjectId(id), status: "listed" },
          { $set: { status: "sold", sold_at: soldAt } },
          { new: true }
        )
        .lean<IListing>()
        .exec()
    );
    if (updated) return "sold";

    const existing = await this.findById(id);
    return existing ? "already_sold" : "not_found";
  }
}

export const listingRepository = new ListingRepository();

import mongoose, { Schema, Types } from "mongoose";

// ----------------------------------------------------------
// Constants
// ----------------------------------------------------------
export const LISTING_STATUS_VALUES = ["listed", "sold"] as const;

export type ListingStatus = (typeof LISTING_STATUS_VALUES)[number];

// ----------------------------------------------------------
// Interfaces
// ----------------------------------------------------------

export interface IListing {
  _id: Types.ObjectId;

  title: string;
  description: string;
  price: number; // major currency units, e.g. 19.99
  seller_id: Types.ObjectId;
  image_path: string;

  // Sale state: "listed" -> "sold", once
  status: ListingStatus;
  sold_at?: Date | null;

  createdAt: Date;
  updatedAt: Date;
}

// ----------------------------------------------------------
// Schema
// ----------------------------------------------------------

const listingSchema = new Schema<IListing>(
  {
    title: { type: String, required: true, trim: true, maxlength: 200 },
    description: { type: String, default: "", maxlength: 5000 },
    price: {
      type: Number,
      required: true,
      validate: {
        validator: (value: number) => Number.isFinite(value) && value > 0,
        message: "price must be a positive number",
      },
    },
    seller_id: {
      type: Schema.Types.ObjectId,
      ref: "User",
      required: true,
      index: true,
    },
    image_path: { type: String, required: true },
    status: {
      type: String,
      enum: LISTING_STATUS_VALUES,
      default: "listed",
      required: true,
      index: true,
    },
    sold_at: { type: Date, default: null },
  },
  { strict: true, timestamps: true }
);

listingSchema.index({ createdAt: -1 });

export const Listing = mongoose.model<IListing>("Listing", listingSchema, "listings");

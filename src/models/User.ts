import mongoose, { Schema, Types } from "mongoose";

// ----------------------------------------------------------
// Interfaces
// ----------------------------------------------------------

export interface IUser {
  _id: Types.ObjectId;

  // Unique and case-sensitive
  username: string;
  hashed_password: string;

  // Contact address for password reset links
  email?: string | null;

  // Stripe Connect account that receives seller payouts
  stripe_account_id?: string | null;

  // Bumped on every credential change; reset tokens carry the value they
  // were issued against
  credential_version: number;

  createdAt: Date;
  updatedAt: Date;
}

// ----------------------------------------------------------
// Schema
// ----------------------------------------------------------

const userSchema = new Schema<IUser>(
  {
    username: {
      type: String,
      required: true,
      unique: true,
      trim: true,
      minlength: 3,
      maxlength: 64,
    },
    hashed_password: { type: String, required: true },
    email: { type: String, default: null, lowercase: true, trim: true },
    stripe_account_id: { type: String, default: null, trim: true },
    credential_version: { type: Number, required: true, default: 0, min: 0 },
  },
  { strict: true, timestamps: true }
);

export const User = mongoose.model<IUser>("User", userSchema, "users");

// src/validation/schemas.ts
import { z } from "zod";

// ----------------------------------------------------------
// Common constants
// ----------------------------------------------------------
const objectIdRegex = /^[a-f\d]{24}$/i;

const username = z
  .string()
  .trim()
  .min(3, "username must be at least 3 characters")
  .max(64, "username must be at most 64 characters");

// bcrypt only looks at the first 72 bytes
const password = z
  .string()
  .min(8, "password must be at least 8 characters")
  .max(72, "password must be at most 72 characters");

const emptyToUndefined = (value: unknown): unknown =>
  typeof value === "string" && value.trim() === "" ? undefined : value;

// ----------------------------------------------------------
// Auth
// ----------------------------------------------------------
export const registerSchema = z.object({
  body: z.object({
    username,
    password,
    email: z.preprocess(emptyToUndefined, z.string().trim().email().optional()),
    stripe_account_id: z.preprocess(
      emptyToUndefined,
      z
        .string()
        .trim()
        .regex(/^acct_[A-Za-z0-9]+$/, "stripe_account_id must look like acct_...")
        .optional()
    ),
  }),
});

export const loginSchema = z.object({
  body: z.object({
    username: z.string().trim().min(1, "username is required"),
    password: z.string().min(1, "password is required"),
  }),
});

export const forgotPasswordSchema = z.object({
  body: z.object({
    username: z.string().trim().min(1, "username is required"),
  }),
});

export const resetPasswordSchema = z.object({
  body: z.object({
    token: z.string().min(1, "token is required"),
    password,
  }),
});

// ----------------------------------------------------------
// Listings
// ----------------------------------------------------------

// Multipart fields arrive as strings
export const createListingSchema = z.object({
  body: z.object({
    title: z.string().trim().min(1, "title is required").max(200),
    description: z.string().trim().max(5000).default(""),
    price: z.coerce
      .number({ invalid_type_error: "price must be a number" })
      .finite()
      .positive("price must be greater than 0"),
    seller_id: z.string().regex(objectIdRegex, "seller_id must be a 24-char MongoDB ObjectId"),
  }),
});

// ----------------------------------------------------------
// Checkout
// ----------------------------------------------------------
export const createCheckoutSchema = z.object({
  body: z.object({
    listing_id: z.string().trim().min(1, "listing_id is required"),
    buyer_email: z.string().trim().email("buyer_email must be a valid email"),
  }),
});

export const checkoutSuccessSchema = z.object({
  query: z.object({
    listing_id: z.string().optional(),
    session_id: z.string().optional(),
  }),
});

export type RegisterInput = z.infer<typeof registerSchema>["body"];
export type LoginInput = z.infer<typeof loginSchema>["body"];
export type ForgotPasswordInput = z.infer<typeof forgotPasswordSchema>["body"];
export type ResetPasswordInput = z.infer<typeof resetPasswordSchema>["body"];
export type CreateListingInput = z.infer<typeof createListingSchema>["body"];
export type CreateCheckoutInput = z.infer<typeof createCheckoutSchema>["body"];
export type CheckoutSuccessQuery = z.infer<typeof checkoutSuccessSchema>["query"];

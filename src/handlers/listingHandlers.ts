import { Request, Response, NextFunction } from "express";
import { ApiResponse } from "../types";
import { successResponse } from "../utils/apiResponse";
import { ValidationError } from "../utils/errors";
import { ListingService, ListingView } from "../services/listing/ListingService";
import { CreateListingInput } from "../validation/schemas";

export function createListingHandlers(listingService: ListingService) {
  /**
   * Enumerate listings, newest first
   * GET /api/v1/listings
   */
  const listings_get = async (
    req: Request,
    res: Response<ApiResponse<ListingView[]>>,
    next: NextFunction
  ): Promise<void> => {
    try {
      const listings = await listingService.list();
      res.json(successResponse(req, listings));
    } catch (err) {
      next(err);
    }
  };

  /**
   * Create a listing from a multipart form with an "image" file
   * POST /api/v1/listings
   */
  const listings_post = async (
    req: Request<{}, {}, CreateListingInput>,
    res: Response<ApiResponse<ListingView>>,
    next: NextFunction
  ): Promise<void> => {
    try {
      if (!req.file) {
        throw new ValidationError("image is required");
      }

      const listing = await listingService.create({
        ...req.body,
        image: {
          originalName: req.file.originalname,
          data: req.file.buffer,
        },
      });

      res.status(201).json(successResponse(req, listing, { message: "Listing created" }));
    } catch (err) {
      next(err);
    }
  };

  return { listings_get, listings_post };
}

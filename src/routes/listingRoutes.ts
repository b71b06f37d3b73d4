import { Router } from "express";
import { createListingHandlers } from "../handlers/listingHandlers";
import { ListingService } from "../services/listing/ListingService";
import { uploadSingle } from "../middleware/upload";
import { validateRequest } from "../middleware/validation";
import { createListingSchema } from "../validation/schemas";

export function listingRoutes(listingService: ListingService): Router {
  const router: Router = Router();
  const handlers = createListingHandlers(listingService);

  router.get("/", handlers.listings_get);
  // multer first: the text fields live in the multipart body
  router.post("/", uploadSingle, validateRequest(createListingSchema), handlers.listings_post);

  return router;
}

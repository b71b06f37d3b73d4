import { Router } from "express";
import { createCheckoutHandlers } from "../handlers/checkoutHandlers";
import { CheckoutService } from "../services/checkout/CheckoutService";
import { SlidingWindowRateLimiter } from "../services/rateLimit/RateLimiter";
import { rateLimit } from "../middleware/operational";
import { validateRequest } from "../middleware/validation";
import { checkoutSuccessSchema, createCheckoutSchema } from "../validation/schemas";

export function checkoutRoutes(
  checkoutService: CheckoutService,
  checkoutLimiter: SlidingWindowRateLimiter
): Router {
  const router: Router = Router();
  const handlers = createCheckoutHandlers(checkoutService);

  router.post(
    "/",
    rateLimit(checkoutLimiter, "checkout"),
    validateRequest(createCheckoutSchema),
    handlers.checkout_post
  );
  router.get("/success", validateRequest(checkoutSuccessSchema), handlers.checkout_success_get);
  router.get("/cancel", validateRequest(checkoutSuccessSchema), handlers.checkout_cancel_get);

  return router;
}

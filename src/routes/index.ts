import { Router, Request, Response } from "express";
import { healthCheck } from "../middleware/operational";
import { ServiceContainer } from "../services";
import { authRoutes } from "./auth";
import { listingRoutes } from "./listingRoutes";
import { checkoutRoutes } from "./checkoutRoutes";

/**
 * Everything under /api except the webhooks, which app.ts mounts before the
 * body parsers.
 */
export function apiRoutes(container: ServiceContainer): Router {
  const router: Router = Router();

  router.get("/", (_req: Request, res: Response) => {
    res.json({ status: "API is running on /api" });
  });
  // Health check endpoint with system metrics
  router.get("/health", healthCheck);

  // -- versioned routes --
  router.use(
    "/v1/auth",
    authRoutes(
      {
        userService: container.userService,
        passwordResetService: container.passwordResetService,
      },
      container.limiters.credentials
    )
  );
  router.use("/v1/listings", listingRoutes(container.listingService));
  router.use(
    "/v1/checkout",
    checkoutRoutes(container.checkoutService, container.limiters.checkout)
  );

  return router;
}

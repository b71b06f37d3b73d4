import { Router } from "express";
import { createAuthHandlers, AuthHandlerDeps } from "../handlers/authHandlers";
import { validateRequest } from "../middleware/validation";
import { rateLimit } from "../middleware/operational";
import { SlidingWindowRateLimiter } from "../services/rateLimit/RateLimiter";
import {
  forgotPasswordSchema,
  loginSchema,
  registerSchema,
  resetPasswordSchema,
} from "../validation/schemas";

export function authRoutes(
  deps: AuthHandlerDeps,
  credentialsLimiter: SlidingWindowRateLimiter
): Router {
  const router: Router = Router();
  const handlers = createAuthHandlers(deps);

  // One budget shared by every credential endpoint
  router.use(rateLimit(credentialsLimiter, "credentials"));

  router.post("/register", validateRequest(registerSchema), handlers.auth_register_post);
  router.post("/login", validateRequest(loginSchema), handlers.auth_login_post);
  router.post(
    "/forgot-password",
    validateRequest(forgotPasswordSchema),
    handlers.auth_forgot_password_post
  );
  router.post(
    "/reset-password",
    validateRequest(resetPasswordSchema),
    handlers.auth_reset_password_post
  );

  return router;
}

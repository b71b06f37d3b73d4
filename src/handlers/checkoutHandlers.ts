import { Request, Response, NextFunction } from "express";
import { ApiResponse } from "../types";
import { successResponse } from "../utils/apiResponse";
import { CheckoutRedirect, CheckoutService } from "../services/checkout/CheckoutService";
import { CheckoutSuccessQuery, CreateCheckoutInput } from "../validation/schemas";

export function createCheckoutHandlers(checkoutService: CheckoutService) {
  /**
   * Start a hosted checkout for a listing
   * POST /api/v1/checkout
   */
  const checkout_post = async (
    req: Request<{}, {}, CreateCheckoutInput>,
    res: Response<ApiResponse<CheckoutRedirect>>,
    next: NextFunction
  ): Promise<void> => {
    try {
      const redirect = await checkoutService.createCheckout(
        req.body.listing_id,
        req.body.buyer_email
      );
      res.json(successResponse(req, redirect));
    } catch (err) {
      next(err);
    }
  };

  /**
   * Landing page after payment. The sale itself is recorded by the webhook.
   * GET /api/v1/checkout/success
   */
  const checkout_success_get = (
    req: Request<{}, {}, {}, CheckoutSuccessQuery>,
    res: Response<ApiResponse<{ status: "success"; listing_id: string | null; session_id: string | null }>>
  ): void => {
    res.json(
      successResponse(
        req,
        {
          status: "success",
          listing_id: req.query.listing_id ?? null,
          session_id: req.query.session_id ?? null,
        },
        { message: "Payment received. Your purchase will be confirmed shortly." }
      )
    );
  };

  /**
   * GET /api/v1/checkout/cancel
   */
  const checkout_cancel_get = (
    req: Request<{}, {}, {}, CheckoutSuccessQuery>,
    res: Response<ApiResponse<{ status: "cancelled"; listing_id: string | null }>>
  ): void => {
    res.json(
      successResponse(
        req,
        { status: "cancelled", listing_id: req.query.listing_id ?? null },
        { message: "Checkout cancelled. The listing is still available." }
      )
    );
  };

  return { checkout_post, checkout_success_get, checkout_cancel_get };
}

import { Request, Response, NextFunction } from "express";
import { ApiResponse } from "../types";
import { successResponse } from "../utils/apiResponse";
import { PublicAccount, UserService } from "../services/user/UserService";
import { PasswordResetService } from "../services/passwordReset/PasswordResetService";
import {
  ForgotPasswordInput,
  LoginInput,
  RegisterInput,
  ResetPasswordInput,
} from "../validation/schemas";

export interface AuthHandlerDeps {
  userService: UserService;
  passwordResetService: PasswordResetService;
}

export function createAuthHandlers({ userService, passwordResetService }: AuthHandlerDeps) {
  /**
   * Create an account
   * POST /api/v1/auth/register
   */
  const auth_register_post = async (
    req: Request<{}, {}, RegisterInput>,
    res: Response<ApiResponse<PublicAccount>>,
    next: NextFunction
  ): Promise<void> => {
    try {
      const account = await userService.register(req.body);
      res.status(201).json(successResponse(req, account, { message: "User created" }));
    } catch (err) {
      next(err);
    }
  };

  /**
   * Verify credentials
   * POST /api/v1/auth/login
   */
  const auth_login_post = async (
    req: Request<{}, {}, LoginInput>,
    res: Response<ApiResponse<PublicAccount>>,
    next: NextFunction
  ): Promise<void> => {
    try {
      const account = await userService.login(req.body.username, req.body.password);
      res.json(successResponse(req, account, { message: "Login successful" }));
    } catch (err) {
      next(err);
    }
  };

  /**
   * Issue a reset token and mail the link
   * POST /api/v1/auth/forgot-password
   */
  const auth_forgot_password_post = async (
    req: Request<{}, {}, ForgotPasswordInput>,
    res: Response<ApiResponse<{ sent: true }>>,
    next: NextFunction
  ): Promise<void> => {
    try {
      await passwordResetService.requestReset(req.body.username);
      res.json(successResponse(req, { sent: true }, { message: "Reset link sent" }));
    } catch (err) {
      next(err);
    }
  };

  /**
   * Exchange a reset token for a new password
   * POST /api/v1/auth/reset-password
   */
  const auth_reset_password_post = async (
    req: Request<{}, {}, ResetPasswordInput>,
    res: Response<ApiResponse<{ reset: true }>>,
    next: NextFunction
  ): Promise<void> => {
    try {
      await passwordResetService.resetPassword(req.body.token, req.body.password);
      res.json(successResponse(req, { reset: true }, { message: "Password updated" }));
    } catch (err) {
      next(err);
    }
  };

  return {
    auth_register_post,
    auth_login_post,
    auth_forgot_password_post,
    auth_reset_password_post,
  };
}

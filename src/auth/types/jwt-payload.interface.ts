// src/auth/types/jwt-payload.interface.ts
import type { Request } from "express";

export type UserRole = "customer" | "seller" | "admin";

export const USER_ROLES: readonly UserRole[] = ["customer", "seller", "admin"];

export interface JwtPayload {
  userId: string;
  email: string;
  username?: string;
  role: UserRole;
  storeId?: string;
}

/** Claims as signed by the account service at login. */
export interface JwtClaims {
  id: string;
  email: string;
  username?: string;
  role?: string;
  storeId?: string;
}

export type AuthedRequest = Request & { user?: JwtPayload };

// src/auth/strategies/jwt.strategy.ts

import { Inject, Injectable, UnauthorizedException } from "@nestjs/common";
import { ConfigType } from "@nestjs/config";
import { PassportStrategy } from "@nestjs/passport";
import { ExtractJwt, Strategy } from "passport-jwt";
import type { Request } from "express";
import { appConfig } from "../../config/configuration";
import {
  JwtClaims,
  JwtPayload,
  USER_ROLES,
  UserRole,
} from "../types/jwt-payload.interface";

function fromTokenCookie(req: Request): string | null {
  const token: unknown = req.cookies?.token;
  return typeof token === "string" && token.length > 0 ? token : null;
}

function toRole(raw: string | undefined): UserRole {
  return USER_ROLES.find((r) => r === raw) ?? "customer";
}

@Injectable()
export class JwtStrategy extends PassportStrategy(Strategy) {
  constructor(@Inject(appConfig.KEY) app: ConfigType<typeof appConfig>) {
    if (!app.jwtSecret) {
      throw new Error("JWT_SECRET environment variable is not defined");
    }
    super({
      // cookie ก่อน แล้วค่อย Authorization: Bearer
      jwtFromRequest: ExtractJwt.fromExtractors([
        fromTokenCookie,
        ExtractJwt.fromAuthHeaderAsBearerToken(),
      ]),
      ignoreExpiration: false,
      secretOrKey: app.jwtSecret,
    });
  }

  validate(payload: JwtClaims): JwtPayload {
    if (!payload?.id) throw new UnauthorizedException("Malformed token");
    return {
      userId: payload.id,
      email: payload.email,
      username: payload.username,
      role: toRole(payload.role),
      storeId: payload.storeId,
    };
  }
}

// auth/optional-jwt.guard.ts
import { Injectable } from "@nestjs/common";
import { AuthGuard } from "@nestjs/passport";
import type { JwtPayload } from "../types/jwt-payload.interface";

@Injectable()
export class OptionalJwtAuthGuard extends AuthGuard("jwt") {
  // ไม่มี token / token ไม่ถูกต้อง -> ไม่ throw; passport ส่ง user=false มา แล้ว route ทำงานแบบ anonymous
  handleRequest<TUser = JwtPayload>(_err: unknown, user: TUser): TUser {
    return user;
  }
}

import { createParamDecorator, ExecutionContext } from "@nestjs/common";
import type {
  AuthedRequest,
  JwtPayload,
} from "../auth/types/jwt-payload.interface";

// OptionalJwtAuthGuard อาจทิ้ง req.user = false ไว้ -> normalize เป็น undefined
export const CurrentUser = createParamDecorator(
  (_data: unknown, ctx: ExecutionContext): JwtPayload | undefined => {
    const req = ctx.switchToHttp().getRequest<AuthedRequest>();
    return req.user || undefined;
  },
);

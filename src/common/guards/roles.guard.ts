import {
  CanActivate,
  ExecutionContext,
  ForbiddenException,
  Injectable,
  Logger,
} from "@nestjs/common";
import { Reflector } from "@nestjs/core";
import { ROLES_KEY } from "../roles.decorator";
import type {
  AuthedRequest,
  UserRole,
} from "../../auth/types/jwt-payload.interface";

// ต้องวางหลัง AuthGuard("jwt") เพื่อให้มี req.user แล้ว
@Injectable()
export class RolesGuard implements CanActivate {
  private readonly logger = new Logger(RolesGuard.name);

  constructor(private readonly reflector: Reflector) {}

  canActivate(context: ExecutionContext): boolean {
    const required = this.reflector.getAllAndOverride<UserRole[] | undefined>(
      ROLES_KEY,
      [context.getHandler(), context.getClass()],
    );
    if (!required || required.length === 0) return true;

    const req = context.switchToHttp().getRequest<AuthedRequest>();
    const role = req.user?.role;
    if (!role || !required.includes(role)) {
      this.logger.warn(
        `Role check failed user=${req.user?.userId ?? "anonymous"} role=${role ?? "none"} required=${required.join("|")}`,
      );
      throw new ForbiddenException("Insufficient role");
    }
    return true;
  }
}

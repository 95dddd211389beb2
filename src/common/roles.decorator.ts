import { SetMetadata } from "@nestjs/common";
import type { UserRole } from "../auth/types/jwt-payload.interface";

export const ROLES_KEY = "roles";

/** Restricts a route (or controller) to users holding one of the roles. */
export const Roles = (...roles: UserRole[]) => SetMetadata(ROLES_KEY, roles);

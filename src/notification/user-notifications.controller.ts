// src/notification/user-notifications.controller.ts
import {
  BadRequestException,
  Controller,
  Get,
  NotFoundException,
  Param,
  Patch,
  Query,
  UseGuards,
} from "@nestjs/common";
import { AuthGuard } from "@nestjs/passport";
import { Types } from "mongoose";
import { CurrentUser } from "../common/current-user.decorator";
import { ParseObjectIdPipe } from "../common/pipes/parse-object-id.pipe";
import type { JwtPayload } from "../auth/types/jwt-payload.interface";
import { NotificationService } from "./notification.service";
import { NOTIFICATION_STATUSES } from "./schemas/notification-schema";

@UseGuards(AuthGuard("jwt"))
@Controller("notifications/me")
export class UserNotificationsController {
  constructor(private readonly notifications: NotificationService) {}

  @Get()
  async list(
    @CurrentUser() user: JwtPayload,
    @Query("status") status?: string,
    @Query("limit") limitStr?: string,
    @Query("cursor") cursor?: string,
  ) {
    const limit = Math.min(
      Math.max(parseInt(limitStr ?? "20", 10) || 20, 1),
      50,
    );

    const st = NOTIFICATION_STATUSES.find((s) => s === status);
    if (status && !st) throw new BadRequestException("invalid status");
    if (cursor && !Types.ObjectId.isValid(cursor))
      throw new BadRequestException("invalid cursor");

    return this.notifications.listForUser(user.userId, {
      status: st,
      limit,
      cursor,
    });
  }

  @Get("counts")
  counts(@CurrentUser() user: JwtPayload) {
    return this.notifications.counts(user.userId);
  }

  @Patch(":id/read")
  async markRead(
    @CurrentUser() user: JwtPayload,
    @Param("id", ParseObjectIdPipe) id: string,
  ) {
    const ok = await this.notifications.markRead(user.userId, id);
    if (!ok) throw new NotFoundException("Notification not found or already read");
    return { ok: true };
  }
}

import { Module } from "@nestjs/common";
import { MongooseModule } from "@nestjs/mongoose";
import { NotificationService } from "./notification.service";
import { UserNotificationsController } from "./user-notifications.controller";
import {
  Notification,
  NotificationSchema,
} from "./schemas/notification-schema";

@Module({
  imports: [
    MongooseModule.forFeature([
      { name: Notification.name, schema: NotificationSchema },
    ]),
  ],
  providers: [NotificationService],
  controllers: [UserNotificationsController],
  exports: [NotificationService], // ให้ reviews นำไป inject ได้
})
export class NotificationModule {}

// src/notification/schemas/notification-schema.ts
import { Schema, SchemaFactory, Prop } from "@nestjs/mongoose";
import { HydratedDocument, Types } from "mongoose";

export type NotificationDocument = HydratedDocument<Notification>;

export const NOTIFICATION_STATUSES = ["UNREAD", "READ"] as const;
export type NotificationStatus = (typeof NOTIFICATION_STATUSES)[number];

export type NotificationType =
  | "REVIEW_SUBMITTED"
  | "REVIEW_APPROVED"
  | "REVIEW_REJECTED"
  | "REVIEW_SELLER_RESPONDED";

@Schema({
  versionKey: false,
  timestamps: { createdAt: true, updatedAt: false },
  collection: "notifications",
})
export class Notification {
  @Prop({ type: Types.ObjectId, required: true, index: true })
  userId!: Types.ObjectId;

  @Prop({
    type: String,
    required: true,
    enum: [...NOTIFICATION_STATUSES],
    default: "UNREAD",
    index: true,
  })
  status!: NotificationStatus;

  @Prop({ type: String, required: true })
  type!: NotificationType;

  @Prop({ required: true })
  title!: string;

  @Prop({ required: true })
  body!: string;

  @Prop({ type: Object, default: {} })
  data!: Record<string, unknown>; // { reviewId, productId, link }

  // ---- Idempotency ----
  @Prop({ required: true }) // unique ต่อผู้ใช้
  dedupeKey!: string; // e.g. `reviews.approved:${reviewId}:${moderatedAt}`

  @Prop()
  readAt?: Date;

  createdAt!: Date;
}

export const NotificationSchema = SchemaFactory.createForClass(Notification);

// Unique กัน insert ซ้ำ (ต่อ userId + dedupeKey)
NotificationSchema.index({ userId: 1, dedupeKey: 1 }, { unique: true });

// ฟีดเรียงล่าสุดก่อน
NotificationSchema.index({ userId: 1, status: 1, createdAt: -1 });

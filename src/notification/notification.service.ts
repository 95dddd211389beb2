import { Injectable, Logger } from "@nestjs/common";
import { InjectModel } from "@nestjs/mongoose";
import { FilterQuery, Model, Types } from "mongoose";
import {
  Notification,
  NotificationDocument,
  NotificationStatus,
  NotificationType,
} from "./schemas/notification-schema";
import type { ReviewRecord } from "../reviews/types/review.types";

export interface NotificationView {
  id: string;
  status: NotificationStatus;
  type: NotificationType;
  title: string;
  body: string;
  data: Record<string, unknown>;
  createdAt: Date;
  readAt?: Date;
}

export interface NotificationFeed {
  items: NotificationView[];
  nextCursor: string | null;
}

type NotificationLean = Notification & { _id: Types.ObjectId };

type NoticeContent = {
  type: NotificationType;
  title: string;
  body: string;
  data: Record<string, unknown>;
};

const reviewData = (review: ReviewRecord) => ({
  reviewId: review.id,
  productId: review.productId,
  link: `/products/${review.productId}#reviews`,
});

const toView = (doc: NotificationLean): NotificationView => ({
  id: String(doc._id),
  status: doc.status,
  type: doc.type,
  title: doc.title,
  body: doc.body,
  data: doc.data,
  createdAt: doc.createdAt,
  readAt: doc.readAt ?? undefined,
});

@Injectable()
export class NotificationService {
  private readonly logger = new Logger(NotificationService.name);

  constructor(
    @InjectModel(Notification.name)
    private readonly notiModel: Model<NotificationDocument>,
  ) {}

  notifyReviewSubmitted(
    review: ReviewRecord,
    productName: string,
  ): Promise<boolean> {
    return this.push(review.buyerId, `reviews.submitted:${review.id}`, {
      type: "REVIEW_SUBMITTED",
      title: "Review Submitted",
      body: `Your review for "${productName}" has been submitted and is pending approval.`,
      data: reviewData(review),
    });
  }

  // รีวิวเดิมถูก moderate ได้หลายรอบ (แก้ไข -> pending -> approve ใหม่) จึงใส่ moderatedAt ใน key
  notifyReviewModerated(
    review: ReviewRecord,
    productName: string,
  ): Promise<boolean> {
    const at = review.moderatedAt?.getTime() ?? review.updatedAt.getTime();
    const approved = review.status === "approved";
    return this.push(review.buyerId, `reviews.${review.status}:${review.id}:${at}`, {
      type: approved ? "REVIEW_APPROVED" : "REVIEW_REJECTED",
      title: approved ? "Review Approved" : "Review Rejected",
      body: approved
        ? `Your review for "${productName}" has been approved and is now visible.`
        : `Your review for "${productName}" has been rejected and will not be displayed.`,
      data: reviewData(review),
    });
  }

  notifySellerResponded(
    review: ReviewRecord,
    productName: string,
  ): Promise<boolean> {
    return this.push(review.buyerId, `reviews.responded:${review.id}`, {
      type: "REVIEW_SELLER_RESPONDED",
      title: "Seller Responded",
      body: `The seller responded to your review for "${productName}".`,
      data: reviewData(review),
    });
  }

  async listForUser(
    userId: string,
    opts: { status?: NotificationStatus; limit: number; cursor?: string },
  ): Promise<NotificationFeed> {
    const match: FilterQuery<NotificationDocument> = {
      userId: new Types.ObjectId(userId),
    };
    if (opts.status) match.status = opts.status;
    if (opts.cursor) match._id = { $lt: new Types.ObjectId(opts.cursor) };

    const docs = await this.notiModel
      .find(match)
      .sort({ _id: -1 })
      .limit(opts.limit)
      .lean<NotificationLean[]>()
      .exec();

    const last = docs[docs.length - 1];
    const nextCursor =
      docs.length === opts.limit && last ? String(last._id) : null;
    return { items: docs.map(toView), nextCursor };
  }

  async counts(userId: string): Promise<{ unread: number; total: number }> {
    const userIdObj = new Types.ObjectId(userId);
    const [unread, total] = await Promise.all([
      this.notiModel.countDocuments({ userId: userIdObj, status: "UNREAD" }),
      this.notiModel.countDocuments({ userId: userIdObj }),
    ]);
    return { unread, total };
  }

  async markRead(userId: string, id: string): Promise<boolean> {
    const res = await this.notiModel.updateOne(
      {
        _id: new Types.ObjectId(id),
        userId: new Types.ObjectId(userId),
        status: "UNREAD",
      },
      { $set: { status: "READ", readAt: new Date() } },
    );
    return res.modifiedCount === 1;
  }

  /** Inserts once per (user, dedupeKey); true when this call created it. */
  private async push(
    userId: string,
    dedupeKey: string,
    content: NoticeContent,
  ): Promise<boolean> {
    const userIdObj = new Types.ObjectId(userId);
    const res = await this.notiModel.updateOne(
      { userId: userIdObj, dedupeKey },
      {
        $setOnInsert: {
          userId: userIdObj,
          status: "UNREAD",
          ...content,
          dedupeKey,
        } satisfies Partial<Notification>,
      },
      { upsert: true },
    );

    const inserted = res.upsertedCount === 1; // ✅ เพิ่ง insert จริงไหม
    if (inserted) {
      this.logger.log(`Notify ${content.type} -> user=${userId} key=${dedupeKey}`);
    }
    return inserted;
  }
}

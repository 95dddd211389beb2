import { Types } from "mongoose";
import type { Review } from "../schemas/review.schema";
import type { ReviewImage } from "../schemas/review-image.schema";
import type { ReviewImageRecord, ReviewRecord } from "../types/review.types";

export type ReviewLean = Review & { _id: Types.ObjectId };
export type ReviewImageLean = ReviewImage & { _id: Types.ObjectId };

const optId = (id?: Types.ObjectId | null) => (id ? String(id) : undefined);

export function toReviewRecord(doc: ReviewLean): ReviewRecord {
  return {
    id: String(doc._id),
    productId: String(doc.productId),
    buyerId: String(doc.buyerId),
    storeId: optId(doc.storeId),
    storeOrderId: optId(doc.storeOrderId),
    rating: doc.rating,
    title: doc.title,
    body: doc.body,
    verifiedPurchase: doc.verifiedPurchase,
    helpfulCount: doc.helpfulCount,
    status: doc.status,
    sellerResponse: doc.sellerResponse || undefined,
    sellerRespondedAt: doc.sellerRespondedAt ?? undefined,
    moderatedAt: doc.moderatedAt ?? undefined,
    moderatedBy: optId(doc.moderatedBy),
    createdAt: doc.createdAt,
    updatedAt: doc.updatedAt,
  };
}

export function toReviewImageRecord(doc: ReviewImageLean): ReviewImageRecord {
  return {
    id: String(doc._id),
    reviewId: String(doc.reviewId),
    url: doc.url,
    caption: doc.caption || undefined,
    displayOrder: doc.displayOrder,
    createdAt: doc.createdAt,
  };
}

/** ObjectId for an optional string id (undefined stays undefined). */
export function toObjectId(id: string): Types.ObjectId;
export function toObjectId(id: string | undefined): Types.ObjectId | undefined;
export function toObjectId(id: string | undefined): Types.ObjectId | undefined {
  return id === undefined ? undefined : new Types.ObjectId(id);
}

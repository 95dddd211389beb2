import { Prop, Schema, SchemaFactory } from "@nestjs/mongoose";
import { HydratedDocument, Types } from "mongoose";
import { REVIEW_STATUSES, ReviewStatus } from "../types/review.types";

export type ReviewDocument = HydratedDocument<Review>;

@Schema({ timestamps: true, collection: "reviews" })
export class Review {
  @Prop({ type: Types.ObjectId, required: true, index: true })
  productId!: Types.ObjectId;
  @Prop({ type: Types.ObjectId, required: true, index: true })
  buyerId!: Types.ObjectId;

  // order อ้างอิงตอนเขียนรีวิว (ใช้ตัดสิน verifiedPurchase ครั้งเดียว)
  @Prop({ type: Types.ObjectId }) storeOrderId?: Types.ObjectId;
  @Prop({ type: Types.ObjectId, index: true }) storeId?: Types.ObjectId;

  @Prop({ required: true, min: 1, max: 5 }) rating!: number;
  @Prop({ required: true, maxlength: 255, trim: true }) title!: string;
  @Prop({ required: true, maxlength: 5000 }) body!: string;

  @Prop({ default: false, index: true }) verifiedPurchase!: boolean;
  @Prop({ default: 0, min: 0 }) helpfulCount!: number;

  @Prop({
    type: String,
    enum: [...REVIEW_STATUSES],
    default: "pending",
    index: true,
  })
  status!: ReviewStatus;

  @Prop({ maxlength: 1000 }) sellerResponse?: string;
  @Prop() sellerRespondedAt?: Date;

  @Prop() moderatedAt?: Date;
  @Prop({ type: Types.ObjectId }) moderatedBy?: Types.ObjectId;

  // timestamps: true
  createdAt!: Date;
  updatedAt!: Date;
}
export const ReviewSchema = SchemaFactory.createForClass(Review);

// 1 buyer รีวิวได้ 1 ครั้งต่อ 1 product
ReviewSchema.index(
  { productId: 1, buyerId: 1 },
  { unique: true, name: "uniq_review_per_buyer_product" },
);

// listing ตาม sort ต่าง ๆ
ReviewSchema.index({ productId: 1, status: 1, createdAt: -1 });
ReviewSchema.index({ productId: 1, status: 1, helpfulCount: -1, createdAt: -1 });
ReviewSchema.index({ productId: 1, status: 1, rating: -1, createdAt: -1 });
ReviewSchema.index({ buyerId: 1, createdAt: -1 });
ReviewSchema.index({ status: 1, createdAt: 1 });

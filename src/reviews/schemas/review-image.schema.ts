import { Prop, Schema, SchemaFactory } from "@nestjs/mongoose";
import { HydratedDocument, Types } from "mongoose";

export type ReviewImageDocument = HydratedDocument<ReviewImage>;

@Schema({
  timestamps: { createdAt: true, updatedAt: false },
  collection: "review_images",
})
export class ReviewImage {
  @Prop({ type: Types.ObjectId, required: true })
  reviewId!: Types.ObjectId;

  @Prop({ type: String, required: true }) url!: string;
  @Prop({ type: String, maxlength: 255 }) caption?: string;

  // น้อยไปมาก; เท่ากันให้ createdAt ตัดสิน
  @Prop({ type: Number, default: 0, min: 0 }) displayOrder!: number;

  createdAt!: Date;
}
export const ReviewImageSchema = SchemaFactory.createForClass(ReviewImage);

ReviewImageSchema.index({ reviewId: 1, displayOrder: 1, createdAt: 1 });

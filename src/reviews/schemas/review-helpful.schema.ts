import { Prop, Schema, SchemaFactory } from "@nestjs/mongoose";
import { HydratedDocument, Types } from "mongoose";

export type ReviewHelpfulDocument = HydratedDocument<ReviewHelpful>;

@Schema({
  timestamps: { createdAt: true, updatedAt: false },
  collection: "review_helpful",
})
export class ReviewHelpful {
  @Prop({ type: Types.ObjectId, required: true })
  reviewId!: Types.ObjectId;

  @Prop({ type: Types.ObjectId, required: true, index: true })
  userId!: Types.ObjectId;

  createdAt!: Date;
}
export const ReviewHelpfulSchema = SchemaFactory.createForClass(ReviewHelpful);

// กันโหวตซ้ำ: 1 user ต่อ 1 review
ReviewHelpfulSchema.index(
  { reviewId: 1, userId: 1 },
  { unique: true, name: "uniq_helpful_per_review_user" },
);

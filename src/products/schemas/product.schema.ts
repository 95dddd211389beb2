import { Prop, Schema, SchemaFactory } from "@nestjs/mongoose";
import mongoose, { HydratedDocument, Types } from "mongoose";

export type ProductDocument = HydratedDocument<Product>;

@Schema({ timestamps: true, collection: "products" })
export class Product {
  @Prop({ required: true }) name!: string;
  @Prop() description?: string;

  @Prop({
    type: mongoose.Schema.Types.ObjectId,
    ref: "Store",
    required: true,
    index: true,
  })
  storeId!: Types.ObjectId;

  @Prop({
    enum: ["draft", "pending", "published", "unpublished", "rejected"],
    default: "draft",
  })
  status!: string;

  // ---- rating สรุปจากรีวิวที่ approved (เขียนโดย ReviewRatingService เท่านั้น) ----
  @Prop({ type: Number, default: 0, min: 0, max: 5 }) ratingAverage!: number;
  @Prop({ type: Number, default: 0, min: 0 }) reviewCount!: number;
  @Prop({ type: Date }) ratingUpdatedAt?: Date;
}

export const ProductSchema = SchemaFactory.createForClass(Product);

ProductSchema.index({ ratingAverage: -1, reviewCount: -1 });

import { Prop, Schema, SchemaFactory } from "@nestjs/mongoose";
import mongoose, { HydratedDocument, Types } from "mongoose";

export type StoreDocument = HydratedDocument<Store>;

@Schema({ collection: "stores" })
export class Store {
  @Prop({ required: true })
  name!: string;

  @Prop({ required: true, unique: true })
  slug!: string;

  // เจ้าของร้าน = seller ที่ตอบรีวิวของสินค้าในร้านได้
  @Prop({ type: mongoose.Schema.Types.ObjectId, ref: "User", index: true })
  ownerId?: Types.ObjectId;

  @Prop({ default: "pending" })
  status!: "pending" | "approved" | "rejected";

  @Prop({ default: () => new Date() })
  createdAt!: Date;
}

export const StoreSchema = SchemaFactory.createForClass(Store);

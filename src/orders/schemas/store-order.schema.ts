// src/orders/schemas/store-order.schema.ts
import { Prop, Schema, SchemaFactory } from "@nestjs/mongoose";
import { HydratedDocument, Types } from "mongoose";

export type StoreOrderDocument = HydratedDocument<StoreOrder>;

export type StoreStatus =
  | "PENDING"
  | "PACKED"
  | "SHIPPED"
  | "DELIVERED"
  | "CANCELED"
  | "RETURNED"; // status สำหรับ seller

@Schema({ _id: false })
export class StoreOrderItem {
  @Prop({ type: Types.ObjectId, required: true }) productId!: Types.ObjectId;
  @Prop({ type: Types.ObjectId }) skuId?: Types.ObjectId;

  @Prop({ required: true }) productName!: string;
  @Prop({ required: true }) quantity!: number;
}
export const StoreOrderItemSchema =
  SchemaFactory.createForClass(StoreOrderItem);

// orders ดูแลโดย order service; reviews อ่านอย่างเดียว (ตรวจ delivered + verified purchase)
@Schema({ timestamps: true, collection: "storeorders" })
export class StoreOrder {
  @Prop({ type: Types.ObjectId, required: true })
  masterOrderId!: Types.ObjectId;
  @Prop({ type: Types.ObjectId, required: true }) storeId!: Types.ObjectId;
  @Prop({ type: Types.ObjectId, required: true }) buyerId!: Types.ObjectId;

  @Prop({
    type: String,
    required: true,
    enum: ["PENDING", "PACKED", "SHIPPED", "DELIVERED", "CANCELED", "RETURNED"],
  })
  status!: StoreStatus;

  @Prop({ type: [StoreOrderItemSchema], default: [] }) items!: StoreOrderItem[];

  @Prop() deliveredAt?: Date;
}
export const StoreOrderSchema = SchemaFactory.createForClass(StoreOrder);

StoreOrderSchema.index({ buyerId: 1, createdAt: -1 });
StoreOrderSchema.index({ buyerId: 1, status: 1, "items.productId": 1 });

import { Injectable } from "@nestjs/common";
import { InjectModel } from "@nestjs/mongoose";
import { Model, Types } from "mongoose";
import {
  StoreOrder,
  StoreOrderDocument,
  StoreStatus,
} from "./schemas/store-order.schema";
import { PurchaseRecord, PurchasesRepository } from "./purchases.repository";

type StoreOrderLean = {
  _id: Types.ObjectId;
  storeId: Types.ObjectId;
  buyerId: Types.ObjectId;
  status: StoreStatus;
  items: { productId: Types.ObjectId }[];
};

@Injectable()
export class MongoPurchasesRepository extends PurchasesRepository {
  constructor(
    @InjectModel(StoreOrder.name)
    private readonly storeOrderModel: Model<StoreOrderDocument>,
  ) {
    super();
  }

  async findBuyerOrder(
    storeOrderId: string,
    buyerId: string,
  ): Promise<PurchaseRecord | null> {
    const so = await this.storeOrderModel
      .findOne({
        _id: new Types.ObjectId(storeOrderId),
        buyerId: new Types.ObjectId(buyerId),
      })
      .select({ _id: 1, storeId: 1, buyerId: 1, status: 1, "items.productId": 1 })
      .lean<StoreOrderLean>()
      .exec();
    if (!so) return null;

    return {
      storeOrderId: String(so._id),
      storeId: String(so.storeId),
      buyerId: String(so.buyerId),
      status: so.status,
      productIds: so.items.map((it) => String(it.productId)),
    };
  }

  async hasDeliveredPurchase(
    buyerId: string,
    productId: string,
  ): Promise<boolean> {
    const exists = await this.storeOrderModel.exists({
      buyerId: new Types.ObjectId(buyerId),
      status: "DELIVERED",
      "items.productId": new Types.ObjectId(productId),
    });
    return !!exists;
  }
}

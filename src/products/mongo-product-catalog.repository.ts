import { Injectable } from "@nestjs/common";
import { InjectModel } from "@nestjs/mongoose";
import { Model, Types } from "mongoose";
import { Product, ProductDocument } from "./schemas/product.schema";
import { Store, StoreDocument } from "../store/schemas/store.schema";
import type { UnitOfWork } from "../common/database/transaction-runner";
import type { ProductRating } from "../reviews/types/review.types";
import {
  CatalogProduct,
  ProductCatalogRepository,
} from "./product-catalog.repository";

type ProductLean = { _id: Types.ObjectId; name: string; storeId: Types.ObjectId };
type StoreLean = { _id: Types.ObjectId; ownerId?: Types.ObjectId };

@Injectable()
export class MongoProductCatalogRepository extends ProductCatalogRepository {
  constructor(
    @InjectModel(Product.name)
    private readonly productModel: Model<ProductDocument>,
    @InjectModel(Store.name) private readonly storeModel: Model<StoreDocument>,
  ) {
    super();
  }

  async findProduct(
    productId: string,
    uow?: UnitOfWork,
  ): Promise<CatalogProduct | null> {
    const product = await this.productModel
      .findById(new Types.ObjectId(productId))
      .select({ _id: 1, name: 1, storeId: 1 })
      .session(uow?.session ?? null)
      .lean<ProductLean>()
      .exec();
    if (!product) return null;

    const store = await this.storeModel
      .findById(product.storeId)
      .select({ _id: 1, ownerId: 1 })
      .session(uow?.session ?? null)
      .lean<StoreLean>()
      .exec();

    return {
      productId: String(product._id),
      name: product.name,
      storeId: String(product.storeId),
      ownerId: store?.ownerId ? String(store.ownerId) : undefined,
    };
  }

  async saveRating(rating: ProductRating, uow: UnitOfWork): Promise<void> {
    await this.productModel.updateOne(
      { _id: new Types.ObjectId(rating.productId) },
      {
        $set: {
          ratingAverage: rating.average,
          reviewCount: rating.count,
          ratingUpdatedAt: new Date(),
        },
      },
      { session: uow.session },
    );
  }
}

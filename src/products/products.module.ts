import { Module } from "@nestjs/common";
import { MongooseModule } from "@nestjs/mongoose";
import { Product, ProductSchema } from "./schemas/product.schema";
import { Store, StoreSchema } from "../store/schemas/store.schema";
import { ProductCatalogRepository } from "./product-catalog.repository";
import { MongoProductCatalogRepository } from "./mongo-product-catalog.repository";

@Module({
  imports: [
    MongooseModule.forFeature([
      { name: Product.name, schema: ProductSchema },
      { name: Store.name, schema: StoreSchema },
    ]),
  ],
  providers: [
    { provide: ProductCatalogRepository, useClass: MongoProductCatalogRepository },
  ],
  exports: [ProductCatalogRepository],
})
export class ProductsModule {}

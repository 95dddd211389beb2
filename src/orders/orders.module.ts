import { Module } from "@nestjs/common";
import { MongooseModule } from "@nestjs/mongoose";
import { StoreOrder, StoreOrderSchema } from "./schemas/store-order.schema";
import { PurchasesRepository } from "./purchases.repository";
import { MongoPurchasesRepository } from "./mongo-purchases.repository";

@Module({
  imports: [
    MongooseModule.forFeature([
      { name: StoreOrder.name, schema: StoreOrderSchema },
    ]),
  ],
  providers: [
    { provide: PurchasesRepository, useClass: MongoPurchasesRepository },
  ],
  exports: [PurchasesRepository],
})
export class OrdersModule {}

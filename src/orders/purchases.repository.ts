import type { StoreStatus } from "./schemas/store-order.schema";

export interface PurchaseRecord {
  storeOrderId: string;
  storeId: string;
  buyerId: string;
  status: StoreStatus;
  productIds: string[];
}

/** Read-only view of the buyer's store orders used for review eligibility. */
export abstract class PurchasesRepository {
  /** The store order when it belongs to `buyerId`, otherwise null. */
  abstract findBuyerOrder(
    storeOrderId: string,
    buyerId: string,
  ): Promise<PurchaseRecord | null>;

  abstract hasDeliveredPurchase(
    buyerId: string,
    productId: string,
  ): Promise<boolean>;
}

import type { UnitOfWork } from "../common/database/transaction-runner";
import type { ProductRating } from "../reviews/types/review.types";

export interface CatalogProduct {
  productId: string;
  name: string;
  storeId: string;
  /** Seller who owns the product's store, when the store has one. */
  ownerId?: string;
}

export abstract class ProductCatalogRepository {
  abstract findProduct(
    productId: string,
    uow?: UnitOfWork,
  ): Promise<CatalogProduct | null>;

  /** Materializes the aggregate rating on the product record. */
  abstract saveRating(rating: ProductRating, uow: UnitOfWork): Promise<void>;
}

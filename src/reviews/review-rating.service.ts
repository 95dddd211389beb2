import { Injectable, Logger } from "@nestjs/common";
import type { UnitOfWork } from "../common/database/transaction-runner";
import { ProductCatalogRepository } from "../products/product-catalog.repository";
import { ReviewsRepository } from "./repositories/reviews.repository";
import { histogramAverage, histogramCount } from "./helper/review-policy";
import type { ProductRating } from "./types/review.types";

/**
 * Keeps the product's materialized rating in step with its approved reviews.
 * Always called inside the transaction of the review mutation that triggered it.
 */
@Injectable()
export class ReviewRatingService {
  private readonly logger = new Logger(ReviewRatingService.name);

  constructor(
    private readonly reviews: ReviewsRepository,
    private readonly catalog: ProductCatalogRepository,
  ) {}

  async recompute(productId: string, uow: UnitOfWork): Promise<ProductRating> {
    const histogram = await this.reviews.approvedHistogram(productId, uow);
    const rating: ProductRating = {
      productId,
      average: histogramAverage(histogram, 2),
      count: histogramCount(histogram),
    };
    await this.catalog.saveRating(rating, uow);

    this.logger.debug(
      `Rating recomputed product=${productId} avg=${rating.average} count=${rating.count}`,
    );
    return rating;
  }
}

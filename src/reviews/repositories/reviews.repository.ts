import type { UnitOfWork } from "../../common/database/transaction-runner";
import type {
  NewReview,
  RatingHistogram,
  ReviewImageInput,
  ReviewImageRecord,
  ReviewPatch,
  ReviewRecord,
  ReviewSort,
  ReviewStatus,
  ReviewUpdateGuard,
  StarRating,
} from "../types/review.types";

export interface ReviewSlice {
  items: ReviewRecord[];
  total: number;
}

export interface ApprovedReviewFilter {
  productId: string;
  rating?: StarRating;
  sort: ReviewSort;
  skip: number;
  limit: number;
}

/**
 * Storage for reviews, their images and helpful votes.
 * Implementations enforce the (product, buyer) and (review, user)
 * uniqueness at the storage layer.
 */
export abstract class ReviewsRepository {
  abstract findById(id: string, uow?: UnitOfWork): Promise<ReviewRecord | null>;

  abstract findByBuyerAndProduct(
    buyerId: string,
    productId: string,
    uow?: UnitOfWork,
  ): Promise<ReviewRecord | null>;

  /** Throws DuplicateReviewException when (product, buyer) already exists. */
  abstract insert(review: NewReview, uow: UnitOfWork): Promise<ReviewRecord>;

  /** Applies `patch` only while `guard` holds; null when it no longer does (or the review is gone). */
  abstract update(
    id: string,
    patch: ReviewPatch,
    uow: UnitOfWork,
    guard?: ReviewUpdateGuard,
  ): Promise<ReviewRecord | null>;

  /** Deletes the review with its images and votes; false when it did not exist. */
  abstract delete(id: string, uow: UnitOfWork): Promise<boolean>;

  /** Appends images after the review's existing ones. */
  abstract addImages(
    reviewId: string,
    images: ReviewImageInput[],
    uow: UnitOfWork,
  ): Promise<ReviewImageRecord[]>;

  /** Images of the given reviews, by displayOrder then createdAt. */
  abstract findImages(
    reviewIds: string[],
    uow?: UnitOfWork,
  ): Promise<ReviewImageRecord[]>;

  /** Records a vote; false when (review, user) had already voted. */
  abstract insertHelpfulVote(
    reviewId: string,
    userId: string,
    uow: UnitOfWork,
  ): Promise<boolean>;

  /** Adds one to an approved review's helpfulCount; null when not approved. */
  abstract incrementHelpful(
    reviewId: string,
    uow: UnitOfWork,
  ): Promise<number | null>;

  /** Per-star counts over the product's approved reviews. */
  abstract approvedHistogram(
    productId: string,
    uow?: UnitOfWork,
  ): Promise<RatingHistogram>;

  abstract listApproved(filter: ApprovedReviewFilter): Promise<ReviewSlice>;

  abstract listByBuyer(
    buyerId: string,
    skip: number,
    limit: number,
  ): Promise<ReviewSlice>;

  /** Oldest first, for the moderation queue. */
  abstract listByStatus(
    status: ReviewStatus,
    skip: number,
    limit: number,
  ): Promise<ReviewSlice>;
}

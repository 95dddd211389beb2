export const REVIEW_STATUSES = ["pending", "approved", "rejected"] as const;
export type ReviewStatus = (typeof REVIEW_STATUSES)[number];

export type ModerationDecision = "approve" | "reject";

export const REVIEW_SORTS = ["recent", "helpful", "highest", "lowest"] as const;
export type ReviewSort = (typeof REVIEW_SORTS)[number];

export type StarRating = 1 | 2 | 3 | 4 | 5;
export const STAR_RATINGS: readonly StarRating[] = [1, 2, 3, 4, 5];

export type RatingHistogram = Record<StarRating, number>;

export interface ReviewRecord {
  id: string;
  productId: string;
  buyerId: string;
  storeId?: string;
  storeOrderId?: string;
  rating: number;
  title: string;
  body: string;
  verifiedPurchase: boolean;
  helpfulCount: number;
  status: ReviewStatus;
  sellerResponse?: string;
  sellerRespondedAt?: Date;
  moderatedAt?: Date;
  moderatedBy?: string;
  createdAt: Date;
  updatedAt: Date;
}

export interface ReviewImageRecord {
  id: string;
  reviewId: string;
  url: string;
  caption?: string;
  displayOrder: number;
  createdAt: Date;
}

export interface ReviewWithImages extends ReviewRecord {
  images: ReviewImageRecord[];
}

export type NewReview = Pick<
  ReviewRecord,
  | "productId"
  | "buyerId"
  | "storeId"
  | "storeOrderId"
  | "rating"
  | "title"
  | "body"
  | "verifiedPurchase"
>;

export type ReviewPatch = Partial<
  Pick<
    ReviewRecord,
    | "rating"
    | "title"
    | "body"
    | "status"
    | "sellerResponse"
    | "sellerRespondedAt"
    | "moderatedAt"
    | "moderatedBy"
  >
>;

/** Preconditions checked atomically with an update. */
export interface ReviewUpdateGuard {
  status?: ReviewStatus;
  withoutSellerResponse?: boolean;
}

export interface ReviewImageInput {
  url: string;
  caption?: string;
}

export interface SubmitReviewInput {
  productId: string;
  storeOrderId?: string;
  rating: number;
  title: string;
  body: string;
  images?: ReviewImageInput[];
}

export interface EditReviewInput {
  rating?: number;
  title?: string;
  body?: string;
  images?: ReviewImageInput[];
}

export interface ProductRating {
  productId: string;
  /** Mean of approved ratings, two decimals; 0 when nothing is approved. */
  average: number;
  count: number;
}

export interface ReviewStats {
  count: number;
  average: number;
  histogram: RatingHistogram;
}

export interface ReviewListQuery {
  rating?: StarRating;
  sort?: ReviewSort;
  page?: number;
  limit?: number;
}

export interface Page<T> {
  items: T[];
  total: number;
  page: number;
  limit: number;
  pages: number;
}

export interface ProductReviewPage extends Page<ReviewWithImages> {
  stats: ReviewStats;
}

export interface HelpfulVoteResult {
  helpfulCount: number;
  wasNewVote: boolean;
}

export interface ReviewMutationResult {
  review: ReviewWithImages;
  rating: ProductRating;
}

export interface ReviewDeletionResult {
  ok: true;
  id: string;
  rating: ProductRating;
}

export interface ReviewEligibility {
  canReview: boolean;
  hasPurchased: boolean;
  hasReviewed: boolean;
}

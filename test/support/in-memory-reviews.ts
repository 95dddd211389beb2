import {
  TransactionRunner,
  UnitOfWork,
} from "../../src/common/database/transaction-runner";
import {
  ApprovedReviewFilter,
  ReviewSlice,
  ReviewsRepository,
} from "../../src/reviews/repositories/reviews.repository";
import {
  CatalogProduct,
  ProductCatalogRepository,
} from "../../src/products/product-catalog.repository";
import {
  PurchaseRecord,
  PurchasesRepository,
} from "../../src/orders/purchases.repository";
import { DuplicateReviewException } from "../../src/reviews/review.errors";
import {
  emptyHistogram,
  isStarRating,
  REVIEW_SORT_SPECS,
  ReviewSortSpec,
} from "../../src/reviews/helper/review-policy";
import type {
  NewReview,
  ProductRating,
  RatingHistogram,
  ReviewImageInput,
  ReviewImageRecord,
  ReviewPatch,
  ReviewRecord,
  ReviewStatus,
  ReviewUpdateGuard,
} from "../../src/reviews/types/review.types";

interface HelpfulVote {
  reviewId: string;
  userId: string;
  createdAt: Date;
}

interface DbState {
  reviews: Map<string, ReviewRecord>;
  images: ReviewImageRecord[];
  votes: HelpfulVote[];
  products: Map<string, CatalogProduct>;
  ratings: Map<string, ProductRating>;
  purchases: PurchaseRecord[];
}

const emptyState = (): DbState => ({
  reviews: new Map(),
  images: [],
  votes: [],
  products: new Map(),
  ratings: new Map(),
  purchases: [],
});

/** Process-local stand-in for the review, catalog and order collections. */
export class InMemoryReviewDb {
  state: DbState = emptyState();
  private seq = 0;

  nextId(): string {
    this.seq += 1;
    return this.seq.toString(16).padStart(24, "0");
  }

  snapshot(): DbState {
    return structuredClone(this.state);
  }

  restore(state: DbState): void {
    this.state = state;
  }

  addProduct(p: { name: string; storeId?: string; ownerId?: string }): string {
    const productId = this.nextId();
    this.state.products.set(productId, {
      productId,
      name: p.name,
      storeId: p.storeId ?? this.nextId(),
      ownerId: p.ownerId,
    });
    return productId;
  }

  addPurchase(p: Omit<PurchaseRecord, "storeOrderId">): string {
    const storeOrderId = this.nextId();
    this.state.purchases.push({ storeOrderId, ...p });
    return storeOrderId;
  }

  seedReview(
    r: Pick<ReviewRecord, "productId" | "buyerId" | "rating"> &
      Partial<ReviewRecord>,
  ): ReviewRecord {
    const now = new Date();
    const review: ReviewRecord = {
      title: "Seeded review",
      body: "Seeded body",
      verifiedPurchase: false,
      helpfulCount: 0,
      status: "approved",
      createdAt: now,
      updatedAt: now,
      ...r,
      id: r.id ?? this.nextId(),
    };
    this.state.reviews.set(review.id, review);
    return { ...review };
  }

  review(id: string): ReviewRecord | undefined {
    const r = this.state.reviews.get(id);
    return r ? { ...r } : undefined;
  }

  rating(productId: string): ProductRating | undefined {
    return this.state.ratings.get(productId);
  }

  votesFor(reviewId: string): number {
    return this.state.votes.filter((v) => v.reviewId === reviewId).length;
  }
}

/**
 * Runs units of work one at a time and restores the pre-transaction state
 * when the work throws.
 */
export class InMemoryTransactionRunner extends TransactionRunner {
  private tail: Promise<unknown> = Promise.resolve();

  constructor(private readonly db: InMemoryReviewDb) {
    super();
  }

  run<T>(work: (uow: UnitOfWork) => Promise<T>): Promise<T> {
    const next = this.tail.then(async () => {
      const before = this.db.snapshot();
      try {
        return await work({});
      } catch (e) {
        this.db.restore(before);
        throw e;
      }
    });
    this.tail = next.catch(() => undefined);
    return next;
  }
}

const sortValue = (r: ReviewRecord, field: ReviewSortSpec[number][0]) =>
  field === "createdAt" ? r.createdAt.getTime() : r[field];

const bySpec =
  (spec: ReviewSortSpec) =>
  (a: ReviewRecord, b: ReviewRecord): number => {
    for (const [field, dir] of spec) {
      const d = sortValue(a, field) - sortValue(b, field);
      if (d !== 0) return d * dir;
    }
    return 0;
  };

export class InMemoryReviewsRepository extends ReviewsRepository {
  constructor(private readonly db: InMemoryReviewDb) {
    super();
  }

  async findById(id: string): Promise<ReviewRecord | null> {
    return this.db.review(id) ?? null;
  }

  async findByBuyerAndProduct(
    buyerId: string,
    productId: string,
  ): Promise<ReviewRecord | null> {
    const found = [...this.db.state.reviews.values()].find(
      (r) => r.buyerId === buyerId && r.productId === productId,
    );
    return found ? { ...found } : null;
  }

  async insert(review: NewReview): Promise<ReviewRecord> {
    if (await this.findByBuyerAndProduct(review.buyerId, review.productId)) {
      throw new DuplicateReviewException();
    }
    const now = new Date();
    const created: ReviewRecord = {
      ...review,
      id: this.db.nextId(),
      helpfulCount: 0,
      status: "pending",
      createdAt: now,
      updatedAt: now,
    };
    this.db.state.reviews.set(created.id, created);
    return { ...created };
  }

  async update(
    id: string,
    patch: ReviewPatch,
    _uow: UnitOfWork,
    guard?: ReviewUpdateGuard,
  ): Promise<ReviewRecord | null> {
    const current = this.db.state.reviews.get(id);
    if (!current) return null;
    if (guard?.status && current.status !== guard.status) return null;
    if (guard?.withoutSellerResponse && current.sellerResponse) return null;

    const updated: ReviewRecord = { ...current, ...patch, updatedAt: new Date() };
    this.db.state.reviews.set(id, updated);
    return { ...updated };
  }

  async delete(id: string): Promise<boolean> {
    const s = this.db.state;
    if (!s.reviews.delete(id)) return false;
    s.images = s.images.filter((img) => img.reviewId !== id);
    s.votes = s.votes.filter((v) => v.reviewId !== id);
    return true;
  }

  async addImages(
    reviewId: string,
    images: ReviewImageInput[],
  ): Promise<ReviewImageRecord[]> {
    const existing = this.db.state.images.filter(
      (img) => img.reviewId === reviewId,
    ).length;
    const created = images.map((img, i) => ({
      id: this.db.nextId(),
      reviewId,
      url: img.url,
      caption: img.caption,
      displayOrder: existing + i,
      createdAt: new Date(),
    }));
    this.db.state.images.push(...created);
    return created.map((img) => ({ ...img }));
  }

  async findImages(reviewIds: string[]): Promise<ReviewImageRecord[]> {
    return this.db.state.images
      .filter((img) => reviewIds.includes(img.reviewId))
      .sort(
        (a, b) =>
          a.displayOrder - b.displayOrder ||
          a.createdAt.getTime() - b.createdAt.getTime(),
      )
      .map((img) => ({ ...img }));
  }

  async insertHelpfulVote(reviewId: string, userId: string): Promise<boolean> {
    const votes = this.db.state.votes;
    if (votes.some((v) => v.reviewId === reviewId && v.userId === userId)) {
      return false;
    }
    votes.push({ reviewId, userId, createdAt: new Date() });
    return true;
  }

  async incrementHelpful(reviewId: string): Promise<number | null> {
    const review = this.db.state.reviews.get(reviewId);
    if (!review || review.status !== "approved") return null;
    review.helpfulCount += 1;
    return review.helpfulCount;
  }

  async approvedHistogram(productId: string): Promise<RatingHistogram> {
    const h = emptyHistogram();
    for (const r of this.db.state.reviews.values()) {
      if (r.productId === productId && r.status === "approved" && isStarRating(r.rating)) {
        h[r.rating] += 1;
      }
    }
    return h;
  }

  async listApproved(filter: ApprovedReviewFilter): Promise<ReviewSlice> {
    const rows = [...this.db.state.reviews.values()].filter(
      (r) =>
        r.productId === filter.productId &&
        r.status === "approved" &&
        (filter.rating === undefined || r.rating === filter.rating),
    );
    return this.slice(rows, bySpec(REVIEW_SORT_SPECS[filter.sort]), filter.skip, filter.limit);
  }

  async listByBuyer(buyerId: string, skip: number, limit: number): Promise<ReviewSlice> {
    const rows = [...this.db.state.reviews.values()].filter(
      (r) => r.buyerId === buyerId,
    );
    return this.slice(rows, bySpec([["createdAt", -1]]), skip, limit);
  }

  async listByStatus(
    status: ReviewStatus,
    skip: number,
    limit: number,
  ): Promise<ReviewSlice> {
    const rows = [...this.db.state.reviews.values()].filter(
      (r) => r.status === status,
    );
    return this.slice(rows, bySpec([["createdAt", 1]]), skip, limit);
  }

  private slice(
    rows: ReviewRecord[],
    compare: (a: ReviewRecord, b: ReviewRecord) => number,
    skip: number,
    limit: number,
  ): ReviewSlice {
    const items = [...rows]
      .sort(compare)
      .slice(skip, skip + limit)
      .map((r) => ({ ...r }));
    return { items, total: rows.length };
  }
}

export class InMemoryCatalogRepository extends ProductCatalogRepository {
  constructor(private readonly db: InMemoryReviewDb) {
    super();
  }

  async findProduct(productId: string): Promise<CatalogProduct | null> {
    const p = this.db.state.products.get(productId);
    return p ? { ...p } : null;
  }

  async saveRating(rating: ProductRating): Promise<void> {
    this.db.state.ratings.set(rating.productId, { ...rating });
  }
}

export class InMemoryPurchasesRepository extends PurchasesRepository {
  constructor(private readonly db: InMemoryReviewDb) {
    super();
  }

  async findBuyerOrder(
    storeOrderId: string,
    buyerId: string,
  ): Promise<PurchaseRecord | null> {
    const found = this.db.state.purchases.find(
      (p) => p.storeOrderId === storeOrderId && p.buyerId === buyerId,
    );
    return found ? { ...found, productIds: [...found.productIds] } : null;
  }

  async hasDeliveredPurchase(buyerId: string, productId: string): Promise<boolean> {
    return this.db.state.purchases.some(
      (p) =>
        p.buyerId === buyerId &&
        p.status === "DELIVERED" &&
        p.productIds.includes(productId),
    );
  }
}

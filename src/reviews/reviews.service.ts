import { Inject, Injectable, Logger } from "@nestjs/common";
import type { ConfigType } from "@nestjs/config";
import { reviewsConfig } from "../config/configuration";
import { TransactionRunner } from "../common/database/transaction-runner";
import { NotificationService } from "../notification/notification.service";
import { PurchasesRepository } from "../orders/purchases.repository";
import { ProductCatalogRepository } from "../products/product-catalog.repository";
import type { JwtPayload } from "../auth/types/jwt-payload.interface";
import { ReviewsRepository, ReviewSlice } from "./repositories/reviews.repository";
import { ReviewRatingService } from "./review-rating.service";
import {
  capImages,
  clampPage,
  filterHistogram,
  histogramAverage,
  histogramCount,
  isWithinEditWindow,
  assertText,
  resolveLimit,
  RESPONSE_MAX,
  validateEdit,
  validateSubmission,
} from "./helper/review-policy";
import {
  AlreadyRespondedException,
  BuyerRequiredException,
  DuplicateReviewException,
  EditWindowExpiredException,
  InvalidModerationStateException,
  NotDeliveredException,
  NotOwnerException,
  NotProductOwnerException,
  OrderNotFoundException,
  ProductNotFoundException,
  ReviewNotApprovedException,
  ReviewNotFoundException,
} from "./review.errors";
import type {
  EditReviewInput,
  HelpfulVoteResult,
  ModerationDecision,
  Page,
  ProductRating,
  ProductReviewPage,
  ReviewDeletionResult,
  ReviewEligibility,
  ReviewListQuery,
  ReviewMutationResult,
  ReviewRecord,
  ReviewWithImages,
  SubmitReviewInput,
} from "./types/review.types";

export type ReviewViewer = Pick<JwtPayload, "userId" | "role">;

@Injectable()
export class ReviewsService {
  private readonly logger = new Logger(ReviewsService.name);

  constructor(
    private readonly reviews: ReviewsRepository,
    private readonly purchases: PurchasesRepository,
    private readonly catalog: ProductCatalogRepository,
    private readonly rating: ReviewRatingService,
    private readonly tx: TransactionRunner,
    private readonly notifications: NotificationService,
    @Inject(reviewsConfig.KEY)
    private readonly cfg: ConfigType<typeof reviewsConfig>,
  ) {}

  // ---------- write / edit / delete ----------

  async submit(
    author: ReviewViewer,
    input: SubmitReviewInput,
  ): Promise<ReviewWithImages> {
    const buyerId = this.requireBuyer(author);
    validateSubmission(input);

    const product = await this.catalog.findProduct(input.productId);
    if (!product) throw new ProductNotFoundException();

    // verifiedPurchase ตัดสินครั้งเดียวตอนสร้าง ไม่คำนวณใหม่ตอนแก้ไข
    let verifiedPurchase = false;
    if (input.storeOrderId) {
      const order = await this.purchases.findBuyerOrder(
        input.storeOrderId,
        buyerId,
      );
      if (!order) throw new OrderNotFoundException();
      if (order.status !== "DELIVERED") throw new NotDeliveredException();
      verifiedPurchase = order.productIds.includes(input.productId);
    }

    const created = await this.tx.run(async (uow) => {
      const existing = await this.reviews.findByBuyerAndProduct(
        buyerId,
        input.productId,
        uow,
      );
      if (existing) throw new DuplicateReviewException();

      const review = await this.reviews.insert(
        {
          productId: input.productId,
          buyerId,
          storeId: product.storeId,
          storeOrderId: input.storeOrderId,
          rating: input.rating,
          title: input.title.trim(),
          body: input.body,
          verifiedPurchase,
        },
        uow,
      );
      const images = await this.reviews.addImages(
        review.id,
        capImages(input.images, this.cfg.maxImagesPerBatch),
        uow,
      );
      return { ...review, images };
    });

    this.logger.log(
      `Review submitted id=${created.id} product=${created.productId} buyer=${buyerId} verified=${verifiedPurchase}`,
    );
    await this.notifySafely("submitted", () =>
      this.notifications.notifyReviewSubmitted(created, product.name),
    );
    return created;
  }

  async edit(
    author: ReviewViewer,
    reviewId: string,
    input: EditReviewInput,
  ): Promise<ReviewMutationResult> {
    const buyerId = this.requireBuyer(author);
    validateEdit(input);

    const result = await this.tx.run(async (uow) => {
      const review = await this.reviews.findById(reviewId, uow);
      if (!review) throw new ReviewNotFoundException();
      if (review.buyerId !== buyerId) throw new NotOwnerException();
      if (
        !isWithinEditWindow(review.createdAt, new Date(), this.cfg.editWindowDays)
      ) {
        throw new EditWindowExpiredException(this.cfg.editWindowDays);
      }

      // แก้ไขแล้วต้องกลับไป pending เสมอ แม้เดิมจะ approved แล้ว
      const updated = await this.reviews.update(
        reviewId,
        {
          ...(input.rating !== undefined ? { rating: input.rating } : {}),
          ...(input.title !== undefined ? { title: input.title.trim() } : {}),
          ...(input.body !== undefined ? { body: input.body } : {}),
          status: "pending",
        },
        uow,
      );
      if (!updated) throw new ReviewNotFoundException();

      await this.reviews.addImages(
        reviewId,
        capImages(input.images, this.cfg.maxImagesPerBatch),
        uow,
      );
      const rating = await this.rating.recompute(updated.productId, uow);
      const images = await this.reviews.findImages([reviewId], uow);
      return { review: { ...updated, images }, rating };
    });

    this.logger.log(
      `Review edited id=${reviewId} buyer=${buyerId} (was re-queued for moderation)`,
    );
    return result;
  }

  async delete(
    author: ReviewViewer,
    reviewId: string,
  ): Promise<ReviewDeletionResult> {
    const buyerId = this.requireBuyer(author);
    const rating = await this.tx.run(async (uow) => {
      const review = await this.reviews.findById(reviewId, uow);
      if (!review) throw new ReviewNotFoundException();
      if (review.buyerId !== buyerId) throw new NotOwnerException();

      const removed = await this.reviews.delete(reviewId, uow);
      if (!removed) throw new ReviewNotFoundException();
      return this.rating.recompute(review.productId, uow);
    });

    this.logger.log(`Review deleted id=${reviewId} buyer=${buyerId}`);
    return { ok: true, id: reviewId, rating };
  }

  // ---------- moderation ----------

  async moderate(
    reviewId: string,
    decision: ModerationDecision,
    moderatorId: string,
  ): Promise<ReviewMutationResult> {
    const result = await this.tx.run(async (uow) => {
      const review = await this.reviews.findById(reviewId, uow);
      if (!review) throw new ReviewNotFoundException();
      if (review.status !== "pending") {
        throw new InvalidModerationStateException(review.status);
      }

      // guard status=pending: edit/moderate ที่แทรกเข้ามาจะทำให้ update ไม่ match
      const updated = await this.reviews.update(
        reviewId,
        {
          status: decision === "approve" ? "approved" : "rejected",
          moderatedAt: new Date(),
          moderatedBy: moderatorId,
        },
        uow,
        { status: "pending" },
      );
      if (!updated) {
        const current = await this.reviews.findById(reviewId, uow);
        if (!current) throw new ReviewNotFoundException();
        throw new InvalidModerationStateException(current.status);
      }

      const rating = await this.rating.recompute(updated.productId, uow);
      const images = await this.reviews.findImages([reviewId], uow);
      return { review: { ...updated, images }, rating };
    });

    this.logger.log(
      `Review moderated id=${reviewId} status=${result.review.status} by=${moderatorId}`,
    );
    await this.notifySafely("moderated", async () => {
      const name = await this.productName(result.review.productId);
      return this.notifications.notifyReviewModerated(result.review, name);
    });
    return result;
  }

  async listModerationQueue(
    page?: number,
    limit?: number,
  ): Promise<Page<ReviewWithImages>> {
    const size = resolveLimit(limit, this.cfg.pageSize, this.cfg.maxPageSize);
    const result = await this.paged(page, size, (skip, take) =>
      this.reviews.listByStatus("pending", skip, take),
    );
    return { ...result, items: await this.withImages(result.items) };
  }

  /** Standalone recompute, for repairing a product's materialized rating. */
  async recomputeProductRating(productId: string): Promise<ProductRating> {
    const product = await this.catalog.findProduct(productId);
    if (!product) throw new ProductNotFoundException();
    const rating = await this.tx.run((uow) =>
      this.rating.recompute(productId, uow),
    );
    this.logger.log(
      `Rating recomputed on request product=${productId} avg=${rating.average} count=${rating.count}`,
    );
    return rating;
  }

  // ---------- helpful votes / seller response ----------

  async markHelpful(reviewId: string, userId: string): Promise<HelpfulVoteResult> {
    const result = await this.tx.run(async (uow) => {
      const review = await this.reviews.findById(reviewId, uow);
      if (!review) throw new ReviewNotFoundException();
      if (review.status !== "approved") throw new ReviewNotApprovedException();

      const isNew = await this.reviews.insertHelpfulVote(reviewId, userId, uow);
      if (!isNew) {
        return { helpfulCount: review.helpfulCount, wasNewVote: false };
      }

      const helpfulCount = await this.reviews.incrementHelpful(reviewId, uow);
      if (helpfulCount === null) throw new ReviewNotApprovedException();
      return { helpfulCount, wasNewVote: true };
    });

    if (result.wasNewVote) {
      this.logger.log(
        `Helpful vote review=${reviewId} user=${userId} count=${result.helpfulCount}`,
      );
    }
    return result;
  }

  async respond(
    sellerId: string,
    reviewId: string,
    response: string,
  ): Promise<ReviewRecord> {
    const text = response.trim();
    assertText("Response", text, RESPONSE_MAX);

    const { review, productName } = await this.tx.run(async (uow) => {
      const current = await this.reviews.findById(reviewId, uow);
      if (!current) throw new ReviewNotFoundException();
      if (current.status !== "approved") throw new ReviewNotApprovedException();

      const product = await this.catalog.findProduct(current.productId, uow);
      if (!product || product.ownerId !== sellerId) {
        throw new NotProductOwnerException();
      }
      if (current.sellerResponse) throw new AlreadyRespondedException();

      const updated = await this.reviews.update(
        reviewId,
        { sellerResponse: text, sellerRespondedAt: new Date() },
        uow,
        { status: "approved", withoutSellerResponse: true },
      );
      if (!updated) throw new AlreadyRespondedException();
      return { review: updated, productName: product.name };
    });

    this.logger.log(`Seller responded review=${reviewId} seller=${sellerId}`);
    await this.notifySafely("responded", () =>
      this.notifications.notifySellerResponded(review, productName),
    );
    return review;
  }

  // ---------- reads ----------

  async listForProduct(
    productId: string,
    query: ReviewListQuery = {},
  ): Promise<ProductReviewPage> {
    const product = await this.catalog.findProduct(productId);
    if (!product) throw new ProductNotFoundException();

    const limit = resolveLimit(query.limit, this.cfg.pageSize, this.cfg.maxPageSize);
    // stats ตาม filter เดียวกับรายการ (ถ้ากรองดาว ก็นับเฉพาะดาวนั้น)
    const histogram = filterHistogram(
      await this.reviews.approvedHistogram(productId),
      query.rating,
    );

    const result = await this.paged(query.page, limit, (skip, take) =>
      this.reviews.listApproved({
        productId,
        rating: query.rating,
        sort: query.sort ?? "recent",
        skip,
        limit: take,
      }),
    );

    return {
      ...result,
      items: await this.withImages(result.items),
      stats: {
        count: histogramCount(histogram),
        average: histogramAverage(histogram, 1),
        histogram,
      },
    };
  }

  async listMine(
    buyerId: string,
    page?: number,
    limit?: number,
  ): Promise<Page<ReviewWithImages>> {
    const size = resolveLimit(limit, this.cfg.pageSize, this.cfg.maxPageSize);
    const result = await this.paged(page, size, (skip, take) =>
      this.reviews.listByBuyer(buyerId, skip, take),
    );
    return { ...result, items: await this.withImages(result.items) };
  }

  async findOne(
    reviewId: string,
    viewer?: ReviewViewer,
  ): Promise<ReviewWithImages> {
    const review = await this.reviews.findById(reviewId);
    if (!review) throw new ReviewNotFoundException();

    // รีวิวที่ยังไม่ approved เห็นได้เฉพาะเจ้าของกับ admin
    const visible =
      review.status === "approved" ||
      viewer?.role === "admin" ||
      viewer?.userId === review.buyerId;
    if (!visible) throw new ReviewNotFoundException();

    const [withImages] = await this.withImages([review]);
    return withImages ?? { ...review, images: [] };
  }

  async eligibility(
    viewer: ReviewViewer,
    productId: string,
  ): Promise<ReviewEligibility> {
    const [hasPurchased, existing] = await Promise.all([
      this.purchases.hasDeliveredPurchase(viewer.userId, productId),
      this.reviews.findByBuyerAndProduct(viewer.userId, productId),
    ]);
    const hasReviewed = existing !== null;
    return {
      canReview: viewer.role !== "seller" && hasPurchased && !hasReviewed,
      hasPurchased,
      hasReviewed,
    };
  }

  // ---------- helpers ----------

  // ร้านค้าเขียน/แก้/ลบรีวิวไม่ได้ รวมถึงรีวิวสินค้าของตัวเอง
  private requireBuyer(author: ReviewViewer): string {
    if (author.role === "seller") throw new BuyerRequiredException();
    return author.userId;
  }

  /** Fetches the requested page; a page past the end falls back to the last one. */
  private async paged(
    page: number | undefined,
    limit: number,
    fetch: (skip: number, limit: number) => Promise<ReviewSlice>,
  ): Promise<Page<ReviewRecord>> {
    const requested = page !== undefined && Number.isInteger(page) && page > 0 ? page : 1;
    let slice = await fetch((requested - 1) * limit, limit);
    const { page: current, pages } = clampPage(requested, slice.total, limit);
    if (current !== requested) {
      slice = await fetch((current - 1) * limit, limit);
    }
    return { items: slice.items, total: slice.total, page: current, limit, pages };
  }

  private async withImages(reviews: ReviewRecord[]): Promise<ReviewWithImages[]> {
    const images = await this.reviews.findImages(reviews.map((r) => r.id));
    return reviews.map((r) => ({
      ...r,
      images: images.filter((img) => img.reviewId === r.id),
    }));
  }

  private async productName(productId: string): Promise<string> {
    const product = await this.catalog.findProduct(productId);
    return product?.name ?? "your product";
  }

  // notification พังไม่ควรทำให้ operation ที่ commit แล้วล้ม
  private async notifySafely(
    event: string,
    send: () => Promise<boolean>,
  ): Promise<void> {
    try {
      await send();
    } catch (e) {
      const msg = e instanceof Error ? e.message : String(e);
      this.logger.warn(`Notification (${event}) failed: ${msg}`);
    }
  }
}

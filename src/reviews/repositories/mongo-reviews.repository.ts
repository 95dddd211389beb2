import { Injectable } from "@nestjs/common";
import { InjectModel } from "@nestjs/mongoose";
import { FilterQuery, Model, SortOrder, Types } from "mongoose";
import { Review, ReviewDocument } from "../schemas/review.schema";
import {
  ReviewImage,
  ReviewImageDocument,
} from "../schemas/review-image.schema";
import {
  ReviewHelpful,
  ReviewHelpfulDocument,
} from "../schemas/review-helpful.schema";
import type { UnitOfWork } from "../../common/database/transaction-runner";
import { isDuplicateKeyError } from "../../common/database/mongo-errors";
import { DuplicateReviewException } from "../review.errors";
import {
  ReviewImageLean,
  ReviewLean,
  toObjectId,
  toReviewImageRecord,
  toReviewRecord,
} from "../mappers/review.mapper";
import {
  emptyHistogram,
  isStarRating,
  REVIEW_SORT_SPECS,
  ReviewSortSpec,
} from "../helper/review-policy";
import type {
  NewReview,
  RatingHistogram,
  ReviewImageInput,
  ReviewImageRecord,
  ReviewPatch,
  ReviewRecord,
  ReviewStatus,
  ReviewUpdateGuard,
} from "../types/review.types";
import {
  ApprovedReviewFilter,
  ReviewSlice,
  ReviewsRepository,
} from "./reviews.repository";

const toMongoSort = (spec: ReviewSortSpec): Record<string, SortOrder> =>
  Object.fromEntries(spec);

@Injectable()
export class MongoReviewsRepository extends ReviewsRepository {
  constructor(
    @InjectModel(Review.name)
    private readonly reviewModel: Model<ReviewDocument>,
    @InjectModel(ReviewImage.name)
    private readonly imageModel: Model<ReviewImageDocument>,
    @InjectModel(ReviewHelpful.name)
    private readonly helpfulModel: Model<ReviewHelpfulDocument>,
  ) {
    super();
  }

  async findById(id: string, uow?: UnitOfWork): Promise<ReviewRecord | null> {
    const doc = await this.reviewModel
      .findById(new Types.ObjectId(id))
      .session(uow?.session ?? null)
      .lean<ReviewLean>()
      .exec();
    return doc ? toReviewRecord(doc) : null;
  }

  async findByBuyerAndProduct(
    buyerId: string,
    productId: string,
    uow?: UnitOfWork,
  ): Promise<ReviewRecord | null> {
    const doc = await this.reviewModel
      .findOne({
        buyerId: new Types.ObjectId(buyerId),
        productId: new Types.ObjectId(productId),
      })
      .session(uow?.session ?? null)
      .lean<ReviewLean>()
      .exec();
    return doc ? toReviewRecord(doc) : null;
  }

  async insert(review: NewReview, uow: UnitOfWork): Promise<ReviewRecord> {
    try {
      const [created] = await this.reviewModel.create(
        [
          {
            productId: new Types.ObjectId(review.productId),
            buyerId: new Types.ObjectId(review.buyerId),
            storeId: toObjectId(review.storeId),
            storeOrderId: toObjectId(review.storeOrderId),
            rating: review.rating,
            title: review.title,
            body: review.body,
            verifiedPurchase: review.verifiedPurchase,
            helpfulCount: 0,
            status: "pending",
          },
        ],
        { session: uow.session, ordered: true },
      );
      if (!created) throw new Error("Review insert returned no document");
      return toReviewRecord(created.toObject());
    } catch (e) {
      // unique index (productId, buyerId) คือด่านสุดท้ายกันรีวิวซ้ำ
      if (isDuplicateKeyError(e)) throw new DuplicateReviewException();
      throw e;
    }
  }

  async update(
    id: string,
    patch: ReviewPatch,
    uow: UnitOfWork,
    guard?: ReviewUpdateGuard,
  ): Promise<ReviewRecord | null> {
    const filter: FilterQuery<ReviewDocument> = {
      _id: new Types.ObjectId(id),
    };
    if (guard?.status) filter.status = guard.status;
    if (guard?.withoutSellerResponse) {
      filter.sellerResponse = { $in: [null, ""] };
    }

    const { moderatedBy, ...rest } = patch;
    const $set = {
      ...rest,
      ...(moderatedBy ? { moderatedBy: new Types.ObjectId(moderatedBy) } : {}),
    };

    const doc = await this.reviewModel
      .findOneAndUpdate(filter, { $set }, { new: true, session: uow.session })
      .lean<ReviewLean>()
      .exec();
    return doc ? toReviewRecord(doc) : null;
  }

  async delete(id: string, uow: UnitOfWork): Promise<boolean> {
    const _id = new Types.ObjectId(id);
    const res = await this.reviewModel.deleteOne(
      { _id },
      { session: uow.session },
    );
    if (res.deletedCount === 0) return false;

    // ทำทีละคำสั่ง: session เดียวกันใน transaction ห้ามยิงขนานกัน
    await this.imageModel.deleteMany(
      { reviewId: _id },
      { session: uow.session },
    );
    await this.helpfulModel.deleteMany(
      { reviewId: _id },
      { session: uow.session },
    );
    return true;
  }

  async addImages(
    reviewId: string,
    images: ReviewImageInput[],
    uow: UnitOfWork,
  ): Promise<ReviewImageRecord[]> {
    if (images.length === 0) return [];
    const rid = new Types.ObjectId(reviewId);

    const existing = await this.imageModel
      .countDocuments({ reviewId: rid })
      .session(uow.session ?? null)
      .exec();

    const docs = await this.imageModel.create(
      images.map((img, i) => ({
        reviewId: rid,
        url: img.url,
        caption: img.caption,
        displayOrder: existing + i,
      })),
      { session: uow.session, ordered: true },
    );
    return docs.map((d) => toReviewImageRecord(d.toObject()));
  }

  async findImages(
    reviewIds: string[],
    uow?: UnitOfWork,
  ): Promise<ReviewImageRecord[]> {
    if (reviewIds.length === 0) return [];
    const docs = await this.imageModel
      .find({ reviewId: { $in: reviewIds.map((id) => new Types.ObjectId(id)) } })
      .sort({ displayOrder: 1, createdAt: 1 })
      .session(uow?.session ?? null)
      .lean<ReviewImageLean[]>()
      .exec();
    return docs.map(toReviewImageRecord);
  }

  // user เดียวกันกดพร้อมกัน -> transaction ชน write conflict แล้ว runner retry; รอบใหม่จะเจอ vote เดิม
  async insertHelpfulVote(
    reviewId: string,
    userId: string,
    uow: UnitOfWork,
  ): Promise<boolean> {
    const reviewIdObj = new Types.ObjectId(reviewId);
    const userIdObj = new Types.ObjectId(userId);

    const res = await this.helpfulModel.updateOne(
      { reviewId: reviewIdObj, userId: userIdObj },
      { $setOnInsert: { reviewId: reviewIdObj, userId: userIdObj } },
      { upsert: true, session: uow.session },
    );
    return res.upsertedCount === 1;
  }

  async incrementHelpful(
    reviewId: string,
    uow: UnitOfWork,
  ): Promise<number | null> {
    const doc = await this.reviewModel
      .findOneAndUpdate(
        { _id: new Types.ObjectId(reviewId), status: "approved" },
        { $inc: { helpfulCount: 1 } },
        { new: true, session: uow.session, timestamps: false },
      )
      .select({ helpfulCount: 1 })
      .lean<{ helpfulCount: number }>()
      .exec();
    return doc ? doc.helpfulCount : null;
  }

  async approvedHistogram(
    productId: string,
    uow?: UnitOfWork,
  ): Promise<RatingHistogram> {
    const rows = await this.reviewModel
      .aggregate<{ _id: number; count: number }>([
        {
          $match: {
            productId: new Types.ObjectId(productId),
            status: "approved",
          },
        },
        { $group: { _id: "$rating", count: { $sum: 1 } } },
      ])
      .session(uow?.session ?? null)
      .exec();

    const histogram = emptyHistogram();
    for (const row of rows) {
      if (isStarRating(row._id)) histogram[row._id] += row.count;
    }
    return histogram;
  }

  async listApproved(filter: ApprovedReviewFilter): Promise<ReviewSlice> {
    const match: FilterQuery<ReviewDocument> = {
      productId: new Types.ObjectId(filter.productId),
      status: "approved",
    };
    if (filter.rating) match.rating = filter.rating;

    return this.slice(
      match,
      toMongoSort(REVIEW_SORT_SPECS[filter.sort]),
      filter.skip,
      filter.limit,
    );
  }

  listByBuyer(buyerId: string, skip: number, limit: number): Promise<ReviewSlice> {
    return this.slice(
      { buyerId: new Types.ObjectId(buyerId) },
      { createdAt: -1 },
      skip,
      limit,
    );
  }

  listByStatus(
    status: ReviewStatus,
    skip: number,
    limit: number,
  ): Promise<ReviewSlice> {
    return this.slice({ status }, { createdAt: 1 }, skip, limit);
  }

  private async slice(
    filter: FilterQuery<ReviewDocument>,
    sort: Record<string, SortOrder>,
    skip: number,
    limit: number,
  ): Promise<ReviewSlice> {
    const [rows, total] = await Promise.all([
      this.reviewModel
        .find(filter)
        .sort(sort)
        .skip(skip)
        .limit(limit)
        .lean<ReviewLean[]>()
        .exec(),
      this.reviewModel.countDocuments(filter),
    ]);
    return { items: rows.map(toReviewRecord), total };
  }
}

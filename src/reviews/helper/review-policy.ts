import {
  EditReviewInput,
  RatingHistogram,
  ReviewImageInput,
  ReviewSort,
  StarRating,
  STAR_RATINGS,
  SubmitReviewInput,
} from "../types/review.types";
import { ReviewValidationException } from "../review.errors";

export const DAY_MS = 24 * 60 * 60 * 1000;

export const TITLE_MAX = 255;
export const BODY_MAX = 5000;
export const RESPONSE_MAX = 1000;
export const CAPTION_MAX = 255;

/** Sortable review fields, in priority order; 1 = ascending, -1 = descending. */
export type ReviewSortField = "createdAt" | "helpfulCount" | "rating";
export type ReviewSortSpec = ReadonlyArray<readonly [ReviewSortField, 1 | -1]>;

export const REVIEW_SORT_SPECS: Record<ReviewSort, ReviewSortSpec> = {
  recent: [["createdAt", -1]],
  helpful: [
    ["helpfulCount", -1],
    ["createdAt", -1],
  ],
  highest: [
    ["rating", -1],
    ["createdAt", -1],
  ],
  lowest: [
    ["rating", 1],
    ["createdAt", -1],
  ],
};

export function isStarRating(n: unknown): n is StarRating {
  return STAR_RATINGS.some((s) => s === n);
}

/**
 * Whole days elapsed since creation must not exceed `windowDays`:
 * with a 30 day window, 30d 23h is still editable and 31d is not.
 */
export function isWithinEditWindow(
  createdAt: Date,
  now: Date,
  windowDays: number,
): boolean {
  const elapsedDays = Math.floor((now.getTime() - createdAt.getTime()) / DAY_MS);
  return elapsedDays <= windowDays;
}

export function roundTo(value: number, decimals: number): number {
  const f = 10 ** decimals;
  return Math.round(value * f) / f;
}

export function emptyHistogram(): RatingHistogram {
  return { 1: 0, 2: 0, 3: 0, 4: 0, 5: 0 };
}

/** Keeps only the given star bucket; no filter keeps the histogram as is. */
export function filterHistogram(
  h: RatingHistogram,
  rating?: StarRating,
): RatingHistogram {
  if (rating === undefined) return h;
  return { ...emptyHistogram(), [rating]: h[rating] };
}

export function histogramCount(h: RatingHistogram): number {
  return STAR_RATINGS.reduce((n, s) => n + h[s], 0);
}

/** Mean star rating of a histogram, 0 when it is empty. */
export function histogramAverage(h: RatingHistogram, decimals: number): number {
  const count = histogramCount(h);
  if (count === 0) return 0;
  const total = STAR_RATINGS.reduce((sum, s) => sum + s * h[s], 0);
  return roundTo(total / count, decimals);
}

// ---------- validation ----------

export function assertRating(rating: unknown): asserts rating is StarRating {
  if (!isStarRating(rating)) {
    throw new ReviewValidationException("Rating must be an integer from 1 to 5");
  }
}

export function assertText(field: string, value: string, max: number): void {
  if (value.trim().length === 0) {
    throw new ReviewValidationException(`${field} must not be empty`);
  }
  if (value.length > max) {
    throw new ReviewValidationException(
      `${field} must be at most ${max} characters`,
    );
  }
}

function assertImages(images: ReviewImageInput[] | undefined): void {
  for (const img of images ?? []) {
    if (img.url.trim().length === 0) {
      throw new ReviewValidationException("Image url must not be empty");
    }
    if (img.caption && img.caption.length > CAPTION_MAX) {
      throw new ReviewValidationException(
        `Image caption must be at most ${CAPTION_MAX} characters`,
      );
    }
  }
}

export function validateSubmission(input: SubmitReviewInput): void {
  assertRating(input.rating);
  assertText("Title", input.title, TITLE_MAX);
  assertText("Body", input.body, BODY_MAX);
  assertImages(input.images);
}

export function validateEdit(input: EditReviewInput): void {
  const touched =
    input.rating !== undefined ||
    input.title !== undefined ||
    input.body !== undefined ||
    (input.images?.length ?? 0) > 0;
  if (!touched) throw new ReviewValidationException("Nothing to update");

  if (input.rating !== undefined) assertRating(input.rating);
  if (input.title !== undefined) assertText("Title", input.title, TITLE_MAX);
  if (input.body !== undefined) assertText("Body", input.body, BODY_MAX);
  assertImages(input.images);
}

/** Keeps the first `max` images of a batch. */
export function capImages(
  images: ReviewImageInput[] | undefined,
  max: number,
): ReviewImageInput[] {
  return (images ?? []).slice(0, max);
}

// ---------- paging ----------

export function resolveLimit(
  limit: number | undefined,
  fallback: number,
  max: number,
): number {
  if (limit === undefined || !Number.isInteger(limit) || limit < 1) return fallback;
  return Math.min(limit, max);
}

/** Clamps a requested page into `[1, pages]`. */
export function clampPage(
  page: number | undefined,
  total: number,
  limit: number,
): { page: number; pages: number } {
  const pages = Math.max(1, Math.ceil(total / limit));
  const requested = page !== undefined && Number.isInteger(page) ? page : 1;
  return { page: Math.min(Math.max(1, requested), pages), pages };
}

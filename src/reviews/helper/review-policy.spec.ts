import {
  capImages,
  clampPage,
  DAY_MS,
  filterHistogram,
  histogramAverage,
  isWithinEditWindow,
  resolveLimit,
  validateEdit,
  validateSubmission,
} from "./review-policy";
import { ReviewValidationException } from "../review.errors";

describe("review-policy", () => {
  describe("isWithinEditWindow", () => {
    const created = new Date(Date.UTC(2026, 2, 1, 12, 0, 0));
    const after = (ms: number) => new Date(created.getTime() + ms);

    it("allows the whole of day 30", () => {
      expect(isWithinEditWindow(created, after(30 * DAY_MS), 30)).toBe(true);
      expect(isWithinEditWindow(created, after(31 * DAY_MS - 1), 30)).toBe(true);
    });

    it("closes once 31 full days have passed", () => {
      expect(isWithinEditWindow(created, after(31 * DAY_MS), 30)).toBe(false);
    });

    it("follows a configured window", () => {
      expect(isWithinEditWindow(created, after(7 * DAY_MS), 7)).toBe(true);
      expect(isWithinEditWindow(created, after(8 * DAY_MS), 7)).toBe(false);
    });
  });

  describe("histogramAverage", () => {
    it("is 0 for an empty histogram", () => {
      expect(histogramAverage({ 1: 0, 2: 0, 3: 0, 4: 0, 5: 0 }, 2)).toBe(0);
    });

    it("rounds to the requested precision", () => {
      const h = { 1: 0, 2: 0, 3: 0, 4: 2, 5: 1 };
      expect(histogramAverage(h, 2)).toBe(4.33);
      expect(histogramAverage(h, 1)).toBe(4.3);
    });
  });

  describe("filterHistogram", () => {
    const h = { 1: 2, 2: 0, 3: 1, 4: 0, 5: 1 };

    it("keeps only the filtered star bucket", () => {
      expect(filterHistogram(h, 1)).toEqual({ 1: 2, 2: 0, 3: 0, 4: 0, 5: 0 });
    });

    it("returns the histogram unchanged without a filter", () => {
      expect(filterHistogram(h)).toBe(h);
    });
  });

  describe("validation", () => {
    it("accepts a well-formed submission", () => {
      expect(() =>
        validateSubmission({ productId: "p", rating: 1, title: "t", body: "b" }),
      ).not.toThrow();
    });

    it("rejects oversized bodies", () => {
      expect(() =>
        validateSubmission({
          productId: "p",
          rating: 3,
          title: "t",
          body: "x".repeat(5001),
        }),
      ).toThrow("Body must be at most 5000 characters");
    });

    it("rejects blank image urls", () => {
      expect(() =>
        validateSubmission({
          productId: "p",
          rating: 3,
          title: "t",
          body: "b",
          images: [{ url: " " }],
        }),
      ).toThrow(ReviewValidationException);
    });

    it("treats an edit with only an empty image list as empty", () => {
      expect(() => validateEdit({ images: [] })).toThrow("Nothing to update");
    });

    it("checks only the fields an edit touches", () => {
      expect(() => validateEdit({ body: "new body" })).not.toThrow();
      expect(() => validateEdit({ rating: 7 })).toThrow(
        "Rating must be an integer from 1 to 5",
      );
    });
  });

  describe("paging", () => {
    it("falls back to the default size and caps large requests", () => {
      expect(resolveLimit(undefined, 10, 50)).toBe(10);
      expect(resolveLimit(0, 10, 50)).toBe(10);
      expect(resolveLimit(20, 10, 50)).toBe(20);
      expect(resolveLimit(80, 10, 50)).toBe(50);
    });

    it("clamps pages into range", () => {
      expect(clampPage(undefined, 0, 10)).toEqual({ page: 1, pages: 1 });
      expect(clampPage(-3, 25, 10)).toEqual({ page: 1, pages: 3 });
      expect(clampPage(9, 25, 10)).toEqual({ page: 3, pages: 3 });
    });
  });

  it("keeps the first images of a batch", () => {
    const images = ["a", "b", "c"].map((url) => ({ url }));
    expect(capImages(images, 2)).toEqual([{ url: "a" }, { url: "b" }]);
    expect(capImages(undefined, 2)).toEqual([]);
  });
});

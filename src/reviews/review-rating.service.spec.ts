import { Test, TestingModule } from "@nestjs/testing";
import { ProductCatalogRepository } from "../products/product-catalog.repository";
import { ReviewsRepository } from "./repositories/reviews.repository";
import { ReviewRatingService } from "./review-rating.service";

describe("ReviewRatingService", () => {
  let service: ReviewRatingService;
  const reviews = { approvedHistogram: jest.fn() };
  const catalog = { saveRating: jest.fn() };
  const uow = {};

  beforeEach(async () => {
    jest.resetAllMocks();
    catalog.saveRating.mockResolvedValue(undefined);

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        ReviewRatingService,
        { provide: ReviewsRepository, useValue: reviews },
        { provide: ProductCatalogRepository, useValue: catalog },
      ],
    }).compile();

    service = module.get<ReviewRatingService>(ReviewRatingService);
  });

  it("writes the approved mean and count inside the caller's unit of work", async () => {
    reviews.approvedHistogram.mockResolvedValue({ 1: 0, 2: 0, 3: 1, 4: 1, 5: 1 });

    const rating = await service.recompute("product-1", uow);

    expect(rating).toEqual({ productId: "product-1", average: 4, count: 3 });
    expect(reviews.approvedHistogram).toHaveBeenCalledWith("product-1", uow);
    expect(catalog.saveRating).toHaveBeenCalledWith(rating, uow);
  });

  it("stores 0 when nothing is approved", async () => {
    reviews.approvedHistogram.mockResolvedValue({ 1: 0, 2: 0, 3: 0, 4: 0, 5: 0 });

    await expect(service.recompute("product-1", uow)).resolves.toEqual({
      productId: "product-1",
      average: 0,
      count: 0,
    });
  });
});

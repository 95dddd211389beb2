import { Test, TestingModule } from "@nestjs/testing";
import { ReviewsController } from "./reviews.controller";
import { ReviewModerationController } from "./review-moderation.controller";
import { ReviewsService } from "./reviews.service";
import type { JwtPayload } from "../auth/types/jwt-payload.interface";

const REVIEW_ID = "65f1c2a9b8e4d3c2b1a09f8e";
const PRODUCT_ID = "65f1c2a9b8e4d3c2b1a09f02";

const buyer: JwtPayload = {
  userId: "65f1c2a9b8e4d3c2b1a09f01",
  email: "buyer@example.test",
  role: "customer",
};
const admin: JwtPayload = {
  userId: "65f1c2a9b8e4d3c2b1a09fad",
  email: "admin@example.test",
  role: "admin",
};

describe("ReviewsController", () => {
  let controller: ReviewsController;
  let moderation: ReviewModerationController;
  const reviews = {
    submit: jest.fn(),
    edit: jest.fn(),
    delete: jest.fn(),
    listForProduct: jest.fn(),
    listMine: jest.fn(),
    eligibility: jest.fn(),
    findOne: jest.fn(),
    markHelpful: jest.fn(),
    respond: jest.fn(),
    moderate: jest.fn(),
    listModerationQueue: jest.fn(),
    recomputeProductRating: jest.fn(),
  };

  beforeEach(async () => {
    jest.resetAllMocks();

    const module: TestingModule = await Test.createTestingModule({
      controllers: [ReviewsController, ReviewModerationController],
      providers: [{ provide: ReviewsService, useValue: reviews }],
    }).compile();

    controller = module.get<ReviewsController>(ReviewsController);
    moderation = module.get<ReviewModerationController>(ReviewModerationController);
  });

  it("submits as the signed-in buyer", async () => {
    const dto = { productId: PRODUCT_ID, rating: 4, title: "Nice", body: "Fits well" };
    reviews.submit.mockResolvedValue({ id: REVIEW_ID });

    await expect(controller.submit(buyer, dto)).resolves.toEqual({ id: REVIEW_ID });
    expect(reviews.submit).toHaveBeenCalledWith(buyer, dto);
  });

  it("passes the caller to edit and delete", async () => {
    await controller.edit(REVIEW_ID, buyer, { title: "Updated" });
    expect(reviews.edit).toHaveBeenCalledWith(buyer, REVIEW_ID, { title: "Updated" });

    await controller.remove(REVIEW_ID, buyer);
    expect(reviews.delete).toHaveBeenCalledWith(buyer, REVIEW_ID);
  });

  it("forwards listing filters", async () => {
    await controller.listForProduct({
      productId: PRODUCT_ID,
      rating: 5,
      sort: "helpful",
      page: 2,
      limit: 20,
    });

    expect(reviews.listForProduct).toHaveBeenCalledWith(PRODUCT_ID, {
      rating: 5,
      sort: "helpful",
      page: 2,
      limit: 20,
    });
  });

  it("lets anonymous visitors read a single review", async () => {
    await controller.findOne(REVIEW_ID, undefined);
    expect(reviews.findOne).toHaveBeenCalledWith(REVIEW_ID, undefined);
  });

  it("votes and responds on behalf of the caller", async () => {
    await controller.markHelpful(REVIEW_ID, buyer);
    expect(reviews.markHelpful).toHaveBeenCalledWith(REVIEW_ID, buyer.userId);

    const seller: JwtPayload = { ...buyer, role: "seller" };
    await controller.respond(REVIEW_ID, seller, { response: "Thanks!" });
    expect(reviews.respond).toHaveBeenCalledWith(seller.userId, REVIEW_ID, "Thanks!");
  });

  it("records the moderating admin", async () => {
    await moderation.moderate(REVIEW_ID, { decision: "approve" }, admin);
    expect(reviews.moderate).toHaveBeenCalledWith(REVIEW_ID, "approve", admin.userId);
  });

  it("pages the moderation queue", async () => {
    await moderation.queue({ page: 3 });
    expect(reviews.listModerationQueue).toHaveBeenCalledWith(3, undefined);
  });
});

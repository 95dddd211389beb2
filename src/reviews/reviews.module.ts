import { Module } from "@nestjs/common";
import { ConfigModule } from "@nestjs/config";
import { MongooseModule } from "@nestjs/mongoose";
import { reviewsConfig } from "../config/configuration";
import { AuthModule } from "../auth/auth.module";
import { NotificationModule } from "../notification/notification.module";
import { OrdersModule } from "../orders/orders.module";
import { ProductsModule } from "../products/products.module";
import { Review, ReviewSchema } from "./schemas/review.schema";
import { ReviewImage, ReviewImageSchema } from "./schemas/review-image.schema";
import {
  ReviewHelpful,
  ReviewHelpfulSchema,
} from "./schemas/review-helpful.schema";
import { ReviewsRepository } from "./repositories/reviews.repository";
import { MongoReviewsRepository } from "./repositories/mongo-reviews.repository";
import { ReviewRatingService } from "./review-rating.service";
import { ReviewsService } from "./reviews.service";
import { ReviewsController } from "./reviews.controller";
import { ReviewModerationController } from "./review-moderation.controller";

@Module({
  imports: [
    ConfigModule.forFeature(reviewsConfig),
    MongooseModule.forFeature([
      { name: Review.name, schema: ReviewSchema },
      { name: ReviewImage.name, schema: ReviewImageSchema },
      { name: ReviewHelpful.name, schema: ReviewHelpfulSchema },
    ]),
    AuthModule,
    NotificationModule,
    OrdersModule,
    ProductsModule,
  ],
  controllers: [ReviewsController, ReviewModerationController],
  providers: [
    { provide: ReviewsRepository, useClass: MongoReviewsRepository },
    ReviewRatingService,
    ReviewsService,
  ],
  exports: [ReviewsService],
})
export class ReviewsModule {}

import {
  Body,
  Controller,
  Get,
  HttpCode,
  Param,
  Post,
  Query,
  UseGuards,
} from "@nestjs/common";
import { AuthGuard } from "@nestjs/passport";
import { CurrentUser } from "../common/current-user.decorator";
import { Roles } from "../common/roles.decorator";
import { RolesGuard } from "../common/guards/roles.guard";
import { ParseObjectIdPipe } from "../common/pipes/parse-object-id.pipe";
import type { JwtPayload } from "../auth/types/jwt-payload.interface";
import { ReviewsService } from "./reviews.service";
import { ModerateReviewDto } from "./dto/moderate-review.dto";
import { PageQueryDto } from "./dto/list-reviews.query";

@Controller("admin/reviews")
@UseGuards(AuthGuard("jwt"), RolesGuard)
@Roles("admin")
export class ReviewModerationController {
  constructor(private readonly reviews: ReviewsService) {}

  @Get("pending")
  queue(@Query() q: PageQueryDto) {
    return this.reviews.listModerationQueue(q.page, q.limit);
  }

  @Post(":reviewId/moderate")
  @HttpCode(200)
  moderate(
    @Param("reviewId", ParseObjectIdPipe) reviewId: string,
    @Body() dto: ModerateReviewDto,
    @CurrentUser() admin: JwtPayload,
  ) {
    return this.reviews.moderate(reviewId, dto.decision, admin.userId);
  }

  @Post("products/:productId/rating")
  @HttpCode(200)
  recompute(@Param("productId", ParseObjectIdPipe) productId: string) {
    return this.reviews.recomputeProductRating(productId);
  }
}

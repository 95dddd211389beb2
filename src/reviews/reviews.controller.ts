import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  Param,
  Patch,
  Post,
  Query,
  UseGuards,
} from "@nestjs/common";
import { AuthGuard } from "@nestjs/passport";
import { CurrentUser } from "../common/current-user.decorator";
import { Roles } from "../common/roles.decorator";
import { RolesGuard } from "../common/guards/roles.guard";
import { ParseObjectIdPipe } from "../common/pipes/parse-object-id.pipe";
import { OptionalJwtAuthGuard } from "../auth/strategies/optional-jwt.strategy";
import type { JwtPayload } from "../auth/types/jwt-payload.interface";
import { ReviewsService } from "./reviews.service";
import { CreateReviewDto } from "./dto/create-review.dto";
import { UpdateReviewDto } from "./dto/update-review.dto";
import {
  ListProductReviewsQueryDto,
  PageQueryDto,
  ProductIdQueryDto,
} from "./dto/list-reviews.query";
import { SellerResponseDto } from "./dto/seller-response.dto";

@Controller("reviews")
export class ReviewsController {
  constructor(private readonly reviews: ReviewsService) {}

  @Post()
  @UseGuards(AuthGuard("jwt"))
  submit(@CurrentUser() user: JwtPayload, @Body() dto: CreateReviewDto) {
    return this.reviews.submit(user, dto);
  }

  // ---- static paths ต้องประกาศก่อน :reviewId ----

  @Get("by-product")
  listForProduct(@Query() q: ListProductReviewsQueryDto) {
    return this.reviews.listForProduct(q.productId, {
      rating: q.rating,
      sort: q.sort,
      page: q.page,
      limit: q.limit,
    });
  }

  @Get("me")
  @UseGuards(AuthGuard("jwt"))
  listMine(@CurrentUser() user: JwtPayload, @Query() q: PageQueryDto) {
    return this.reviews.listMine(user.userId, q.page, q.limit);
  }

  @Get("eligibility")
  @UseGuards(AuthGuard("jwt"))
  eligibility(@CurrentUser() user: JwtPayload, @Query() q: ProductIdQueryDto) {
    return this.reviews.eligibility(user, q.productId);
  }

  @Get(":reviewId")
  @UseGuards(OptionalJwtAuthGuard)
  findOne(
    @Param("reviewId", ParseObjectIdPipe) reviewId: string,
    @CurrentUser() user?: JwtPayload,
  ) {
    return this.reviews.findOne(reviewId, user);
  }

  @Patch(":reviewId")
  @UseGuards(AuthGuard("jwt"))
  edit(
    @Param("reviewId", ParseObjectIdPipe) reviewId: string,
    @CurrentUser() user: JwtPayload,
    @Body() dto: UpdateReviewDto,
  ) {
    return this.reviews.edit(user, reviewId, dto);
  }

  @Delete(":reviewId")
  @UseGuards(AuthGuard("jwt"))
  remove(
    @Param("reviewId", ParseObjectIdPipe) reviewId: string,
    @CurrentUser() user: JwtPayload,
  ) {
    return this.reviews.delete(user, reviewId);
  }

  @Post(":reviewId/helpful")
  @HttpCode(200)
  @UseGuards(AuthGuard("jwt"))
  markHelpful(
    @Param("reviewId", ParseObjectIdPipe) reviewId: string,
    @CurrentUser() user: JwtPayload,
  ) {
    return this.reviews.markHelpful(reviewId, user.userId);
  }

  @Post(":reviewId/response")
  @HttpCode(200)
  @UseGuards(AuthGuard("jwt"), RolesGuard)
  @Roles("seller")
  respond(
    @Param("reviewId", ParseObjectIdPipe) reviewId: string,
    @CurrentUser() user: JwtPayload,
    @Body() dto: SellerResponseDto,
  ) {
    return this.reviews.respond(user.userId, reviewId, dto.response);
  }
}

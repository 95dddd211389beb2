import { Type } from "class-transformer";
import { IsIn, IsInt, IsMongoId, IsOptional, Max, Min } from "class-validator";
import { REVIEW_SORTS, ReviewSort } from "../types/review.types";

export class PageQueryDto {
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  page?: number;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(1000)
  limit?: number; // ถูก clamp ที่ REVIEW_MAX_PAGE_SIZE อีกชั้น
}

export class ListProductReviewsQueryDto extends PageQueryDto {
  @IsMongoId()
  productId!: string;

  @IsOptional()
  @Type(() => Number)
  @IsIn([1, 2, 3, 4, 5])
  rating?: 1 | 2 | 3 | 4 | 5;

  @IsOptional()
  @IsIn([...REVIEW_SORTS])
  sort?: ReviewSort;
}

export class ProductIdQueryDto {
  @IsMongoId()
  productId!: string;
}

import {
  IsArray,
  IsInt,
  IsMongoId,
  IsOptional,
  IsString,
  Max,
  MaxLength,
  Min,
  ValidateNested,
} from "class-validator";
import { Type } from "class-transformer";

export class ReviewImageDto {
  @IsString() @MaxLength(2048) url!: string;
  @IsOptional() @IsString() @MaxLength(255) caption?: string;
}

export class CreateReviewDto {
  @IsMongoId() productId!: string;

  // ส่งมาเมื่อรีวิวจากคำสั่งซื้อ -> ใช้ตัดสิน verifiedPurchase
  @IsOptional() @IsMongoId() storeOrderId?: string;

  @Type(() => Number) @IsInt() @Min(1) @Max(5) rating!: number;

  @IsString() @MaxLength(255) title!: string;
  @IsString() @MaxLength(5000) body!: string;

  // เกิน limit ไม่ reject: service เก็บแค่ N รูปแรก
  @IsOptional()
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => ReviewImageDto)
  images?: ReviewImageDto[];
}

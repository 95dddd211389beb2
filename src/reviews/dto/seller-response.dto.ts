import { IsString, MaxLength } from "class-validator";

export class SellerResponseDto {
  @IsString() @MaxLength(1000) response!: string;
}

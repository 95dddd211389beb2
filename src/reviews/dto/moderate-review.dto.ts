import { IsIn } from "class-validator";
import type { ModerationDecision } from "../types/review.types";

export class ModerateReviewDto {
  @IsIn(["approve", "reject"])
  decision!: ModerationDecision;
}

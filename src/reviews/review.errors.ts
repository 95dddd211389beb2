import { HttpException, HttpStatus } from "@nestjs/common";

export type ReviewErrorCode =
  | "DuplicateReview"
  | "BuyerRequired"
  | "NotDelivered"
  | "EditWindowExpired"
  | "NotOwner"
  | "NotProductOwner"
  | "InvalidModerationState"
  | "ReviewNotApproved"
  | "AlreadyResponded"
  | "ValidationError"
  | "ReviewNotFound"
  | "ProductNotFound"
  | "OrderNotFound";

/** Base for every recoverable review failure; the body carries `code` for clients. */
export class ReviewException extends HttpException {
  constructor(
    readonly code: ReviewErrorCode,
    message: string,
    status: HttpStatus,
  ) {
    super({ statusCode: status, code, message }, status);
  }
}

export class DuplicateReviewException extends ReviewException {
  constructor() {
    super(
      "DuplicateReview",
      "You have already reviewed this product",
      HttpStatus.CONFLICT,
    );
  }
}

export class BuyerRequiredException extends ReviewException {
  constructor() {
    super(
      "BuyerRequired",
      "Only buyer accounts can write reviews",
      HttpStatus.FORBIDDEN,
    );
  }
}

export class NotDeliveredException extends ReviewException {
  constructor() {
    super(
      "NotDelivered",
      "You can only review products from delivered orders",
      HttpStatus.FORBIDDEN,
    );
  }
}

export class EditWindowExpiredException extends ReviewException {
  constructor(days: number) {
    super(
      "EditWindowExpired",
      `Reviews can only be edited within ${days} days of posting`,
      HttpStatus.FORBIDDEN,
    );
  }
}

export class NotOwnerException extends ReviewException {
  constructor() {
    super("NotOwner", "This review belongs to another buyer", HttpStatus.FORBIDDEN);
  }
}

export class NotProductOwnerException extends ReviewException {
  constructor() {
    super(
      "NotProductOwner",
      "You can only respond to reviews of your own products",
      HttpStatus.FORBIDDEN,
    );
  }
}

export class InvalidModerationStateException extends ReviewException {
  constructor(status: string) {
    super(
      "InvalidModerationState",
      `Only pending reviews can be moderated (current: ${status})`,
      HttpStatus.CONFLICT,
    );
  }
}

export class ReviewNotApprovedException extends ReviewException {
  constructor() {
    super("ReviewNotApproved", "Review is not approved", HttpStatus.CONFLICT);
  }
}

export class AlreadyRespondedException extends ReviewException {
  constructor() {
    super(
      "AlreadyResponded",
      "You have already responded to this review",
      HttpStatus.CONFLICT,
    );
  }
}

export class ReviewValidationException extends ReviewException {
  constructor(message: string) {
    super("ValidationError", message, HttpStatus.BAD_REQUEST);
  }
}

export class ReviewNotFoundException extends ReviewException {
  constructor() {
    super("ReviewNotFound", "Review not found", HttpStatus.NOT_FOUND);
  }
}

export class ProductNotFoundException extends ReviewException {
  constructor() {
    super("ProductNotFound", "Product not found", HttpStatus.NOT_FOUND);
  }
}

export class OrderNotFoundException extends ReviewException {
  constructor() {
    super("OrderNotFound", "Store order not found", HttpStatus.NOT_FOUND);
  }
}

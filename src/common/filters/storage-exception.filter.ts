import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpStatus,
  Logger,
} from "@nestjs/common";
import type { Request, Response } from "express";
import { mongo } from "mongoose";
import type { ErrorResponse } from "./http-exception.filter";

/**
 * Driver errors that escape a review operation (the transaction has already
 * been rolled back) surface as a retryable 503.
 */
@Catch(mongo.MongoError)
export class StorageExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(StorageExceptionFilter.name);

  catch(exception: mongo.MongoError, host: ArgumentsHost) {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();

    this.logger.error(
      `Storage failure on ${request.method} ${request.url}: ${exception.message}`,
      exception.stack,
    );

    const status = HttpStatus.SERVICE_UNAVAILABLE;
    const body: ErrorResponse = {
      statusCode: status,
      code: "StorageUnavailable",
      message: "Storage is temporarily unavailable, please retry",
      error: HttpStatus[status],
      timestamp: new Date().toISOString(),
      path: request.url,
    };
    response.status(status).json(body);
  }
}

import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
  Logger,
} from "@nestjs/common";
import type { Request, Response } from "express";

export interface ErrorResponse {
  statusCode: number;
  code?: string;
  message: string;
  error: string;
  timestamp: string;
  path: string;
}

function readField(body: object, key: string): unknown {
  return key in body ? Reflect.get(body, key) : undefined;
}

/** Flattens an HttpException's response into `{ message, code? }`. */
export function describeHttpException(exception: HttpException): {
  message: string;
  code?: string;
} {
  const body = exception.getResponse();
  if (typeof body === "string") return { message: body };

  const msg = readField(body, "message");
  const code = readField(body, "code");
  const message = Array.isArray(msg)
    ? msg.map(String).join(", ")
    : typeof msg === "string"
      ? msg
      : exception.message || "An error occurred";
  return typeof code === "string" ? { message, code } : { message };
}

/**
 * Global HTTP exception filter: one error body shape for every endpoint,
 * carrying the domain `code` when the exception has one.
 */
@Catch(HttpException)
export class HttpExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(HttpExceptionFilter.name);

  catch(exception: HttpException, host: ArgumentsHost) {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();
    const status = exception.getStatus();
    const { message, code } = describeHttpException(exception);

    const errorResponse: ErrorResponse = {
      statusCode: status,
      ...(code ? { code } : {}),
      message,
      error: HttpStatus[status] ?? "Error",
      timestamp: new Date().toISOString(),
      path: request.url,
    };

    // 4xx ทั่วไปไม่ต้อง log ยกเว้น 401/403
    if (status >= 500 || status === 401 || status === 403) {
      this.logger.error(
        `HTTP ${status} ${code ?? ""} ${message} | ${request.method} ${request.url}`,
        exception.stack,
      );
    }

    response.status(status).json(errorResponse);
  }
}

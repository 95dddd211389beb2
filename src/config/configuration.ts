import { registerAs } from "@nestjs/config";
import type { LogLevel } from "@nestjs/common";

const LOG_LEVELS: LogLevel[] = ["error", "warn", "log", "debug", "verbose"];

export function intFromEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === "") return fallback;
  const n = Number(raw);
  return Number.isInteger(n) && n > 0 ? n : fallback;
}

/** levels ที่เปิดใช้ = ระดับที่เลือก + ทุกระดับที่รุนแรงกว่า */
export function resolveLogLevels(level: string | undefined): LogLevel[] {
  const idx = LOG_LEVELS.findIndex((l) => l === level);
  return LOG_LEVELS.slice(0, idx === -1 ? 3 : idx + 1);
}

export const appConfig = registerAs("app", () => ({
  port: intFromEnv("PORT", 3001),
  corsOrigin: process.env.CORS_ORIGIN ?? "http://localhost:3000",
  mongodbUri: process.env.MONGODB_URI ?? "",
  jwtSecret: process.env.JWT_SECRET ?? "",
}));

export const reviewsConfig = registerAs("reviews", () => ({
  editWindowDays: intFromEnv("REVIEW_EDIT_WINDOW_DAYS", 30),
  maxImagesPerBatch: intFromEnv("REVIEW_MAX_IMAGES", 5),
  pageSize: intFromEnv("REVIEW_PAGE_SIZE", 10),
  maxPageSize: intFromEnv("REVIEW_MAX_PAGE_SIZE", 50),
}));

import {
  appConfig,
  intFromEnv,
  resolveLogLevels,
  reviewsConfig,
} from "./configuration";
import { validateEnvironmentVariables } from "./env.validation";

describe("configuration", () => {
  const saved = { ...process.env };

  afterEach(() => {
    process.env = { ...saved };
  });

  it("reads positive integers and falls back otherwise", () => {
    process.env.REVIEW_EDIT_WINDOW_DAYS = "14";
    process.env.REVIEW_MAX_IMAGES = "-1";
    process.env.REVIEW_PAGE_SIZE = "ten";
    delete process.env.REVIEW_MAX_PAGE_SIZE;

    expect(reviewsConfig()).toEqual({
      editWindowDays: 14,
      maxImagesPerBatch: 5,
      pageSize: 10,
      maxPageSize: 50,
    });
    expect(intFromEnv("REVIEW_EDIT_WINDOW_DAYS", 30)).toBe(14);
  });

  it("builds the app namespace from the environment", () => {
    process.env.PORT = "4000";
    process.env.CORS_ORIGIN = "http://shop.example.test";
    process.env.MONGODB_URI = "mongodb://localhost:27017/reviews?replicaSet=rs0";
    process.env.JWT_SECRET = "test-secret";

    expect(appConfig()).toEqual({
      port: 4000,
      corsOrigin: "http://shop.example.test",
      mongodbUri: "mongodb://localhost:27017/reviews?replicaSet=rs0",
      jwtSecret: "test-secret",
    });
  });

  it("enables the chosen log level and everything more severe", () => {
    expect(resolveLogLevels("warn")).toEqual(["error", "warn"]);
    expect(resolveLogLevels("verbose")).toEqual([
      "error",
      "warn",
      "log",
      "debug",
      "verbose",
    ]);
    expect(resolveLogLevels(undefined)).toEqual(["error", "warn", "log"]);
  });

  describe("validateEnvironmentVariables", () => {
    it("lists every missing required variable", () => {
      expect(() => validateEnvironmentVariables({})).toThrow(
        "Environment validation failed:\n  - MONGODB_URI is not defined.\n  - JWT_SECRET is not defined.",
      );
    });

    it("requires CORS_ORIGIN in production", () => {
      expect(() =>
        validateEnvironmentVariables({
          NODE_ENV: "production",
          MONGODB_URI: "mongodb://localhost:27017/reviews?replicaSet=rs0",
          JWT_SECRET: "test-secret",
        }),
      ).toThrow("CORS_ORIGIN must be set in production.");
    });

    it("accepts a complete environment", () => {
      expect(() =>
        validateEnvironmentVariables({
          MONGODB_URI: "mongodb://localhost:27017/reviews?replicaSet=rs0",
          JWT_SECRET: "test-secret",
        }),
      ).not.toThrow();
    });
  });
});

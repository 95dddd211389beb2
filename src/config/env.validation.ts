import { Logger } from "@nestjs/common";

/**
 * Checks required environment variables before the app boots and throws
 * with every problem listed.
 */
export function validateEnvironmentVariables(
  env: NodeJS.ProcessEnv = process.env,
): void {
  const logger = new Logger("EnvironmentValidation");
  const errors: string[] = [];
  const warnings: string[] = [];

  if (!env.MONGODB_URI) {
    errors.push("MONGODB_URI is not defined.");
  } else if (!/replicaSet=|mongodb\+srv:/.test(env.MONGODB_URI)) {
    warnings.push(
      "MONGODB_URI does not name a replica set; review writes use transactions and need one.",
    );
  }

  if (!env.JWT_SECRET) {
    errors.push("JWT_SECRET is not defined.");
  }

  if (env.NODE_ENV === "production" && !env.CORS_ORIGIN) {
    errors.push("CORS_ORIGIN must be set in production.");
  }

  warnings.forEach((w) => logger.warn(w));

  if (errors.length > 0) {
    errors.forEach((e) => logger.error(e));
    throw new Error(
      `Environment validation failed:\n${errors.map((e) => `  - ${e}`).join("\n")}`,
    );
  }
}

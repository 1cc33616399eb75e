/**
 * @fileoverview Loads, validates, and exports application configuration.
 * This module centralizes configuration management, sourcing values from
 * environment variables and `package.json`. It uses Zod for schema validation
 * to ensure type safety and correctness of configuration parameters.
 *
 * @module src/config/index
 */

import dotenv from "dotenv";
import { existsSync, mkdirSync, readFileSync, statSync } from "fs";
import path, { dirname, join } from "path";
import { fileURLToPath } from "url";
import { z } from "zod";

dotenv.config();

// --- Determine Project Root ---
const findProjectRoot = (startDir: string): string => {
  let currentDir = startDir;
  // If the start directory is in `dist`, start searching from the parent directory.
  if (path.basename(currentDir) === "dist") {
    currentDir = path.dirname(currentDir);
  }
  while (true) {
    const packageJsonPath = join(currentDir, "package.json");
    if (existsSync(packageJsonPath)) {
      return currentDir;
    }
    const parentDir = dirname(currentDir);
    if (parentDir === currentDir) {
      throw new Error(
        `Could not find project root (package.json) starting from ${startDir}`,
      );
    }
    currentDir = parentDir;
  }
};
let projectRoot: string;
try {
  const currentModuleDir = dirname(fileURLToPath(import.meta.url));
  projectRoot = findProjectRoot(currentModuleDir);
} catch (error: unknown) {
  const errorMessage = error instanceof Error ? error.message : String(error);
  console.error(`FATAL: Error determining project root: ${errorMessage}`);
  projectRoot = process.cwd();
  if (process.stderr.isTTY) {
    console.warn(
      `Warning: Using process.cwd() (${projectRoot}) as fallback project root.`,
    );
  }
}
// --- End Determine Project Root ---

const PackageJsonSchema = z.object({
  name: z.string().optional(),
  version: z.string().optional(),
  description: z.string().optional(),
});

/**
 * Loads and parses the package.json file from the project root.
 * @returns The parsed package.json fields or a fallback default.
 * @private
 */
const loadPackageJson = (): {
  name: string;
  version: string;
  description: string;
} => {
  const pkgPath = join(projectRoot, "package.json");
  const fallback = {
    name: "kegg-pull",
    version: "0.0.0",
    description: "No description provided.",
  };

  if (!existsSync(pkgPath)) {
    if (process.stderr.isTTY) {
      console.warn(
        `Warning: package.json not found at ${pkgPath}. Using fallback values.`,
      );
    }
    return fallback;
  }

  try {
    const parsed = PackageJsonSchema.safeParse(
      JSON.parse(readFileSync(pkgPath, "utf-8")),
    );
    if (!parsed.success) {
      return fallback;
    }
    return {
      name: parsed.data.name ?? fallback.name,
      version: parsed.data.version ?? fallback.version,
      description: parsed.data.description ?? fallback.description,
    };
  } catch (error) {
    if (process.stderr.isTTY) {
      console.error(
        "Warning: Could not read or parse package.json. Using hardcoded defaults.",
        error,
      );
    }
    return fallback;
  }
};

const pkg = loadPackageJson();

const EnvSchema = z.object({
  NODE_ENV: z.string().default("development"),

  // Logging
  KEGG_LOG_LEVEL: z
    .enum([
      "debug",
      "info",
      "notice",
      "warning",
      "error",
      "crit",
      "alert",
      "emerg",
    ])
    .default("info"),
  LOGS_DIR: z.string().default(path.join(projectRoot, "logs")),

  // KEGG REST API
  KEGG_BASE_URL: z.string().url().default("https://rest.kegg.jp"),
  KEGG_N_TRIES: z.coerce.number().int().positive().default(3),
  KEGG_TIMEOUT_SECONDS: z.coerce.number().positive().default(60),
  KEGG_SLEEP_SECONDS: z.coerce.number().nonnegative().default(5),
  KEGG_N_WORKERS: z.coerce.number().int().positive().optional(),
  KEGG_PULL_RESULTS_PATH: z.string().min(1).default("pull-results.json"),

  // MCP server identity
  MCP_SERVER_NAME: z.string().optional(),
  MCP_SERVER_VERSION: z.string().optional(),

  /** The logical name of the service used for tracer spans. */
  OTEL_SERVICE_NAME: z.string().optional(),
  /** The version of the service used for tracer spans. */
  OTEL_SERVICE_VERSION: z.string().optional(),
});

const parsedEnv = EnvSchema.safeParse(process.env);

if (!parsedEnv.success) {
  if (process.stderr.isTTY) {
    console.error(
      "Invalid environment variables:",
      parsedEnv.error.flatten().fieldErrors,
    );
  }
}

const env = parsedEnv.success ? parsedEnv.data : EnvSchema.parse({});

const ensureDirectory = (
  dirPath: string,
  rootDir: string,
  dirName: string,
): string | null => {
  const resolvedDirPath = path.isAbsolute(dirPath)
    ? dirPath
    : path.resolve(rootDir, dirPath);

  if (
    !resolvedDirPath.startsWith(rootDir + path.sep) &&
    resolvedDirPath !== rootDir
  ) {
    if (process.stderr.isTTY) {
      console.error(
        `Error: ${dirName} path "${dirPath}" resolves to "${resolvedDirPath}", which is outside the project boundary "${rootDir}".`,
      );
    }
    return null;
  }

  if (!existsSync(resolvedDirPath)) {
    try {
      mkdirSync(resolvedDirPath, { recursive: true });
    } catch (err: unknown) {
      const errorMessage = err instanceof Error ? err.message : String(err);
      if (process.stderr.isTTY) {
        console.error(
          `Error creating ${dirName} directory at ${resolvedDirPath}: ${errorMessage}`,
        );
      }
      return null;
    }
  } else {
    try {
      const stats = statSync(resolvedDirPath);
      if (!stats.isDirectory()) {
        if (process.stderr.isTTY) {
          console.error(
            `Error: ${dirName} path ${resolvedDirPath} exists but is not a directory.`,
          );
        }
        return null;
      }
    } catch (statError: unknown) {
      const errorMessage =
        statError instanceof Error
          ? statError.message
          : "An unknown error occurred";
      if (process.stderr.isTTY) {
        console.error(
          `Error accessing ${dirName} path ${resolvedDirPath}: ${errorMessage}`,
        );
      }
      return null;
    }
  }
  return resolvedDirPath;
};

// File logging is off under test so runs leave nothing behind.
const validatedLogsPath: string | null =
  env.NODE_ENV === "test"
    ? null
    : ensureDirectory(env.LOGS_DIR, projectRoot, "logs");

if (!validatedLogsPath && env.NODE_ENV !== "test" && process.stderr.isTTY) {
  console.warn(
    `Warning: Logs directory ('${env.LOGS_DIR}') is invalid or outside the project boundary. File logging will be disabled.`,
  );
}

export const config = {
  pkg,
  projectRoot,
  mcpServerName: env.MCP_SERVER_NAME || pkg.name,
  mcpServerVersion: env.MCP_SERVER_VERSION || pkg.version,
  mcpServerDescription: pkg.description,
  logLevel: env.KEGG_LOG_LEVEL,
  logsPath: validatedLogsPath,
  environment: env.NODE_ENV,
  kegg: {
    baseUrl: env.KEGG_BASE_URL.replace(/\/+$/, ""),
    nTries: env.KEGG_N_TRIES,
    timeoutSeconds: env.KEGG_TIMEOUT_SECONDS,
    sleepSeconds: env.KEGG_SLEEP_SECONDS,
    nWorkers: env.KEGG_N_WORKERS,
    pullResultsPath: env.KEGG_PULL_RESULTS_PATH,
  },
  openTelemetry: {
    serviceName: env.OTEL_SERVICE_NAME || env.MCP_SERVER_NAME || pkg.name,
    serviceVersion:
      env.OTEL_SERVICE_VERSION || env.MCP_SERVER_VERSION || pkg.version,
  },
};

export type LogLevel = typeof config.logLevel;

export const logLevel: LogLevel = config.logLevel;
export const environment: string = config.environment;

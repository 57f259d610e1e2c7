/**
 * Application configuration
 *
 * Read once from the environment (after dotenv has loaded `.env`) and
 * validated against a TypeBox schema. Sections that a stage can run without
 * (`odk`, `storage`) are null when their variables are absent; the stage that
 * needs them raises ConfigError for that cycle only.
 */

import "dotenv/config";

import { Type, type Static, type TSchema } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

import { ConfigError } from "./errors.js";

// ============================================================================
// Schema
// ============================================================================

export const LinkStrategySchema = Type.Union([
  Type.Literal("prefix"),
  Type.Literal("reference"),
  Type.Literal("hybrid"),
]);

export type LinkStrategy = Static<typeof LinkStrategySchema>;

export const OdkConfigSchema = Type.Object({
  baseUrl: Type.String({ minLength: 1, pattern: "^https?://" }),
  projectId: Type.String({ minLength: 1 }),
  formId: Type.String({ minLength: 1 }),
  username: Type.String(),
  password: Type.String(),
  repeatGroup: Type.String({ minLength: 1 }),
  pageSize: Type.Integer({ minimum: 1, maximum: 10_000 }),
});

export type OdkConfig = Static<typeof OdkConfigSchema>;

export const StorageConfigSchema = Type.Object({
  accessKeyId: Type.String({ minLength: 1 }),
  secretAccessKey: Type.String({ minLength: 1 }),
  bucket: Type.String({ minLength: 1 }),
  region: Type.String({ minLength: 1 }),
  endpoint: Type.Union([Type.String({ minLength: 1 }), Type.Null()]),
  baseFolder: Type.String({ minLength: 1 }),
  // SigV4 presigned URLs cannot outlive seven days
  signedUrlTtlSeconds: Type.Integer({ minimum: 60, maximum: 604_800 }),
});

export type StorageConfig = Static<typeof StorageConfigSchema>;

export const SyncConfigSchema = Type.Object({
  intervalSeconds: Type.Integer({ minimum: 1 }),
  maxWorkers: Type.Integer({ minimum: 1, maximum: 100 }),
  prioritizeNew: Type.Boolean(),
  enableUrlRefresh: Type.Boolean(),
  urlRefreshThresholdHours: Type.Number({ minimum: 0 }),
  linkStrategy: LinkStrategySchema,
  childKeySeparator: Type.String({ minLength: 1 }),
  historyRetentionDays: Type.Integer({ minimum: 1 }),
});

export type SyncConfig = Static<typeof SyncConfigSchema>;

const CoreConfigSchema = Type.Object({
  databaseUrl: Type.String({ minLength: 1 }),
  sync: SyncConfigSchema,
  server: Type.Object({
    port: Type.Integer({ minimum: 1, maximum: 65_535 }),
    host: Type.String({ minLength: 1 }),
  }),
});

export const AppConfigSchema = Type.Object({
  ...CoreConfigSchema.properties,
  odk: Type.Union([OdkConfigSchema, Type.Null()]),
  storage: Type.Union([StorageConfigSchema, Type.Null()]),
});

export type AppConfig = Static<typeof AppConfigSchema>;

// Schema path -> variable name, for error messages
const ENV_NAMES: Record<string, string> = {
  "/databaseUrl": "DATABASE_URL",
  "/odk/baseUrl": "ODK_BASE_URL",
  "/odk/projectId": "ODK_PROJECT_ID",
  "/odk/formId": "ODK_FORM_ID",
  "/odk/repeatGroup": "ODK_REPEAT_GROUP",
  "/odk/pageSize": "ODK_PAGE_SIZE",
  "/storage/endpoint": "S3_ENDPOINT",
  "/storage/baseFolder": "S3_BASE_FOLDER",
  "/storage/signedUrlTtlSeconds": "SIGNED_URL_TTL_SECONDS",
  "/sync/intervalSeconds": "SYNC_INTERVAL",
  "/sync/maxWorkers": "MAX_WORKERS",
  "/sync/urlRefreshThresholdHours": "URL_REFRESH_THRESHOLD_HOURS",
  "/sync/linkStrategy": "CHILD_LINK_STRATEGY",
  "/sync/childKeySeparator": "CHILD_KEY_SEPARATOR",
  "/sync/historyRetentionDays": "HISTORY_RETENTION_DAYS",
  "/server/port": "PORT",
  "/server/host": "HOST",
};

// ============================================================================
// Environment readers
// ============================================================================

type Env = Record<string, string | undefined>;

function readString(env: Env, name: string): string | undefined {
  const value = env[name]?.trim();
  return value === undefined || value === "" ? undefined : value;
}

function readNumber(env: Env, name: string, fallback: number): number {
  const value = readString(env, name);
  return value === undefined ? fallback : Number(value);
}

function readBoolean(
  env: Env,
  name: string,
  fallback: boolean,
  issues: string[]
): boolean {
  const value = readString(env, name)?.toLowerCase();
  if (value === undefined) return fallback;
  if (["true", "1", "yes", "on"].includes(value)) return true;
  if (["false", "0", "no", "off"].includes(value)) return false;
  issues.push(`${name}: expected a boolean, got "${value}"`);
  return fallback;
}

function readLinkStrategy(env: Env, issues: string[]): LinkStrategy {
  const value = readString(env, "CHILD_LINK_STRATEGY") ?? "hybrid";
  if (value === "prefix" || value === "reference" || value === "hybrid") {
    return value;
  }
  issues.push(
    `CHILD_LINK_STRATEGY: expected prefix, reference or hybrid, got "${value}"`
  );
  return "hybrid";
}

function readOdkConfig(env: Env, issues: string[]): OdkConfig | null {
  const baseUrl = readString(env, "ODK_BASE_URL");
  const projectId = readString(env, "ODK_PROJECT_ID");
  const formId = readString(env, "ODK_FORM_ID");

  if (baseUrl === undefined && projectId === undefined && formId === undefined) {
    return null;
  }
  if (baseUrl === undefined || projectId === undefined || formId === undefined) {
    issues.push("ODK_BASE_URL, ODK_PROJECT_ID and ODK_FORM_ID must be set together");
    return null;
  }

  return {
    baseUrl: baseUrl.replace(/\/+$/, ""),
    projectId,
    formId,
    username: readString(env, "ODATA_USER") ?? "",
    password: env.ODATA_PASS ?? "",
    repeatGroup: readString(env, "ODK_REPEAT_GROUP") ?? "person_details",
    pageSize: readNumber(env, "ODK_PAGE_SIZE", 500),
  };
}

function readStorageConfig(env: Env): StorageConfig | null {
  const accessKeyId = readString(env, "AWS_ACCESS_KEY_ID");
  const secretAccessKey = readString(env, "AWS_SECRET_ACCESS_KEY");
  const bucket = readString(env, "AWS_BUCKET_NAME");
  const region = readString(env, "AWS_REGION");

  if (
    accessKeyId === undefined ||
    secretAccessKey === undefined ||
    bucket === undefined ||
    region === undefined
  ) {
    return null;
  }

  return {
    accessKeyId,
    secretAccessKey,
    bucket,
    region,
    endpoint: readString(env, "S3_ENDPOINT") ?? null,
    baseFolder: (readString(env, "S3_BASE_FOLDER") ?? "odk_images").replace(
      /^\/+|\/+$/g,
      ""
    ),
    signedUrlTtlSeconds: readNumber(env, "SIGNED_URL_TTL_SECONDS", 86_400),
  };
}

// ============================================================================
// Loading
// ============================================================================

function collectIssues(
  schema: TSchema,
  value: unknown,
  prefix: string,
  issues: string[]
): void {
  for (const error of Value.Errors(schema, value)) {
    const path = `${prefix}${error.path}`;
    issues.push(`${ENV_NAMES[path] ?? path}: ${error.message}`);
  }
}

/**
 * Build and validate the configuration from environment variables.
 *
 * @throws ConfigError listing every invalid variable
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const issues: string[] = [];

  const config: AppConfig = {
    databaseUrl:
      readString(env, "DATABASE_URL") ?? "postgresql://localhost:5432/odk_sync",
    odk: readOdkConfig(env, issues),
    storage: readStorageConfig(env),
    sync: {
      intervalSeconds: readNumber(env, "SYNC_INTERVAL", 60),
      maxWorkers: readNumber(env, "MAX_WORKERS", 10),
      prioritizeNew: readBoolean(env, "PRIORITIZE_NEW", true, issues),
      enableUrlRefresh: readBoolean(env, "ENABLE_URL_REFRESH", true, issues),
      urlRefreshThresholdHours: readNumber(env, "URL_REFRESH_THRESHOLD_HOURS", 2),
      linkStrategy: readLinkStrategy(env, issues),
      childKeySeparator: env.CHILD_KEY_SEPARATOR ?? "_",
      historyRetentionDays: readNumber(env, "HISTORY_RETENTION_DAYS", 30),
    },
    server: {
      port: readNumber(env, "PORT", 3000),
      host: readString(env, "HOST") ?? "0.0.0.0",
    },
  };

  collectIssues(CoreConfigSchema, config, "", issues);
  if (config.odk !== null) {
    collectIssues(OdkConfigSchema, config.odk, "/odk", issues);
  }
  if (config.storage !== null) {
    collectIssues(StorageConfigSchema, config.storage, "/storage", issues);
  }

  if (issues.length > 0) {
    throw new ConfigError(`Invalid configuration (${String(issues.length)} issues)`, issues);
  }

  return config;
}

/**
 * Resolve a required section, failing the calling stage when it is absent
 */
export function requireSection<T>(section: T | null, description: string): T {
  if (section === null) {
    throw new ConfigError(`${description} is not configured`);
  }
  return section;
}

import { TEST_BUCKET } from "./storage.js";

import type { AppConfig, OdkConfig, StorageConfig } from "../../src/config.js";

export const TEST_ODK: OdkConfig = {
  baseUrl: "https://odk.test",
  projectId: "7",
  formId: "survey",
  username: "collector@example.test",
  password: "test-secret",
  repeatGroup: "person_details",
  pageSize: 500,
};

export const TEST_STORAGE: StorageConfig = {
  accessKeyId: "test-access-key",
  secretAccessKey: "test-secret",
  bucket: TEST_BUCKET,
  region: "test-region-1",
  endpoint: null,
  baseFolder: "odk_images",
  signedUrlTtlSeconds: 86_400,
};

export function testConfig(overrides: Partial<AppConfig> = {}): AppConfig {
  return {
    databaseUrl: "sqlite::memory:",
    odk: TEST_ODK,
    storage: TEST_STORAGE,
    sync: {
      intervalSeconds: 60,
      maxWorkers: 2,
      prioritizeNew: true,
      enableUrlRefresh: true,
      urlRefreshThresholdHours: 2,
      linkStrategy: "hybrid",
      childKeySeparator: "_",
      historyRetentionDays: 30,
    },
    server: { port: 3000, host: "127.0.0.1" },
    ...overrides,
  };
}

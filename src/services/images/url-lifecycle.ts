/**
 * URL Lifecycle Manager
 *
 * Signed image URLs expire. Each stored URL is classified against a refresh
 * horizon, and URLs inside it are re-signed for the same object path without
 * re-uploading anything.
 *
 *   NoUrl -> Valid             first upload and sign
 *   Valid -> ExpiringSoon      now + threshold >= expiry
 *   ExpiringSoon/Expired -> Valid   re-sign succeeded
 *
 * A URL whose object path cannot be recovered stays Expired and is flagged
 * `unrecoverable_url`, which keeps it out of later refresh scans.
 */

import { errorMessage, storageLogger } from "../../logger.js";
import { mapWithConcurrency } from "../../utils/concurrency.js";

import type { Database, SubmissionUpdate } from "../../db/types.js";
import type { ObjectStorage } from "../../storage/object-storage.js";
import type { ImageRole } from "../../storage/paths.js";
import type { Kysely } from "kysely";

export type UrlState = "NoUrl" | "Valid" | "ExpiringSoon" | "Expired";

export const UNRECOVERABLE_URL = "unrecoverable_url";

export const IMAGE_ROLES: readonly ImageRole[] = ["building", "address"];

// ============================================================================
// Pure URL functions
// ============================================================================

const AMZ_DATE = /^(\d{4})(\d{2})(\d{2})T(\d{2})(\d{2})(\d{2})Z$/;
const DIGITS = /^\d+$/;

function parseUrl(url: string): URL | null {
  try {
    return new URL(url);
  } catch {
    return null;
  }
}

/**
 * Expiry embedded in a signed URL: SigV2 `Expires` (epoch seconds) or SigV4
 * `X-Amz-Date` plus `X-Amz-Expires`. Null when absent or malformed.
 */
export function parseUrlExpiry(url: string): Date | null {
  const params = parseUrl(url)?.searchParams;
  if (params === undefined) return null;

  const expires = params.get("Expires");
  if (expires !== null) {
    return DIGITS.test(expires) ? new Date(Number(expires) * 1000) : null;
  }

  const signedAt = params.get("X-Amz-Date");
  const lifetime = params.get("X-Amz-Expires");
  if (signedAt === null || lifetime === null || !DIGITS.test(lifetime)) {
    return null;
  }

  const parts = AMZ_DATE.exec(signedAt);
  if (parts === null) return null;

  const signedMs = Date.UTC(
    Number(parts[1]),
    Number(parts[2]) - 1,
    Number(parts[3]),
    Number(parts[4]),
    Number(parts[5]),
    Number(parts[6])
  );
  return Number.isNaN(signedMs)
    ? null
    : new Date(signedMs + Number(lifetime) * 1000);
}

/**
 * Classify a URL against a refresh horizon. The horizon boundary is
 * inclusive; an unreadable expiry counts as Expired.
 */
export function classifyUrl(
  url: string | null | undefined,
  thresholdHours: number,
  now: Date = new Date()
): UrlState {
  if (url === null || url === undefined || url === "") return "NoUrl";

  const expiry = parseUrlExpiry(url);
  if (expiry === null) return "Expired";

  const expiryMs = expiry.getTime();
  const nowMs = now.getTime();
  if (expiryMs <= nowMs) return "Expired";
  if (nowMs + thresholdHours * 3_600_000 >= expiryMs) return "ExpiringSoon";
  return "Valid";
}

export function needsRefresh(state: UrlState): boolean {
  return state === "ExpiringSoon" || state === "Expired";
}

function decodeSegments(segments: string[]): string[] | null {
  try {
    return segments.map((segment) => decodeURIComponent(segment));
  } catch {
    return null;
  }
}

/**
 * Recover the object key from a virtual-hosted
 * (`<bucket>.s3.<region>.amazonaws.com/<key>`) or path-style
 * (`<endpoint>/<bucket>/<key>`) URL. Null for foreign or malformed URLs.
 */
export function extractStoragePath(url: string, bucket: string): string | null {
  const parsed = parseUrl(url);
  if (parsed === null) return null;

  const segments = decodeSegments(
    parsed.pathname.split("/").filter((segment) => segment !== "")
  );
  if (segments === null) return null;

  let keySegments: string[];
  const host = parsed.hostname;
  if (host.startsWith(`${bucket}.s3.`) || host.startsWith(`${bucket}.s3-`)) {
    keySegments = segments;
  } else if (segments[0] === bucket) {
    keySegments = segments.slice(1);
  } else {
    return null;
  }

  const key = keySegments.join("/");
  return key === "" ? null : key;
}

// ============================================================================
// Manager
// ============================================================================

export interface UrlLifecycleOptions {
  thresholdHours: number;
  ttlSeconds: number;
  maxWorkers: number;
  now?: () => Date;
}

interface ImageUrlRow {
  uuid: string;
  building_image_url: string | null;
  address_image_url: string | null;
  building_image_error: string | null;
  address_image_error: string | null;
}

export type UrlInspection = Record<
  ImageRole,
  Record<UrlState, number> & { unrecoverable: number }
>;

function roleUrl(row: ImageUrlRow, role: ImageRole): string | null {
  return role === "building" ? row.building_image_url : row.address_image_url;
}

function roleError(row: ImageUrlRow, role: ImageRole): string | null {
  return role === "building"
    ? row.building_image_error
    : row.address_image_error;
}

function flagUpdate(role: ImageRole): SubmissionUpdate {
  return role === "building"
    ? { building_image_error: UNRECOVERABLE_URL }
    : { address_image_error: UNRECOVERABLE_URL };
}

function urlUpdate(role: ImageRole, url: string): SubmissionUpdate {
  return role === "building"
    ? { building_image_url: url, building_image_error: null }
    : { address_image_url: url, address_image_error: null };
}

export class UrlLifecycleManager {
  private readonly now: () => Date;

  constructor(
    private readonly db: Kysely<Database>,
    private readonly storage: ObjectStorage,
    private readonly options: UrlLifecycleOptions
  ) {
    this.now = options.now ?? (() => new Date());
  }

  classify(url: string | null): UrlState {
    return classifyUrl(url, this.options.thresholdHours, this.now());
  }

  /**
   * Sign a fresh URL for an existing object
   *
   * @throws StorageAccessError when the object cannot be reached or signed
   */
  async refresh(
    path: string,
    ttlSeconds = this.options.ttlSeconds
  ): Promise<string> {
    return this.storage.sign(path, ttlSeconds);
  }

  private rolesToRefresh(row: ImageUrlRow): ImageRole[] {
    return IMAGE_ROLES.filter(
      (role) =>
        roleError(row, role) !== UNRECOVERABLE_URL &&
        roleUrl(row, role) !== null &&
        needsRefresh(this.classify(roleUrl(row, role)))
    );
  }

  private async loadRows(): Promise<ImageUrlRow[]> {
    return this.db
      .selectFrom("submissions")
      .select([
        "uuid",
        "building_image_url",
        "address_image_url",
        "building_image_error",
        "address_image_error",
      ])
      .where((eb) =>
        eb.or([
          eb("building_image_url", "is not", null),
          eb("address_image_url", "is not", null),
        ])
      )
      .orderBy("uuid")
      .execute();
  }

  /**
   * Re-sign every image URL inside the refresh horizon.
   *
   * @returns number of URL fields updated (0, 1 or 2 per row)
   */
  async refreshExpiredUrls(
    maxWorkers = this.options.maxWorkers
  ): Promise<number> {
    const rows = await this.loadRows();
    const candidates = rows
      .map((row) => ({ row, roles: this.rolesToRefresh(row) }))
      .filter((candidate) => candidate.roles.length > 0);

    storageLogger.info(
      { scanned: rows.length, candidates: candidates.length, maxWorkers },
      "Refreshing signed URLs"
    );

    const counts = await mapWithConcurrency(
      candidates,
      maxWorkers,
      async ({ row, roles }) => {
        let refreshed = 0;
        for (const role of roles) {
          if (await this.refreshRole(row, role)) refreshed++;
        }
        return refreshed;
      }
    );

    const total = counts.reduce((sum, count) => sum + count, 0);
    storageLogger.info({ refreshed: total }, "Signed URL refresh finished");
    return total;
  }

  private async refreshRole(
    row: ImageUrlRow,
    role: ImageRole
  ): Promise<boolean> {
    const url = roleUrl(row, role);
    if (url === null) return false;

    const path = extractStoragePath(url, this.storage.bucket);
    if (path === null) {
      await this.flagUnrecoverable(row, role, url);
      return false;
    }

    try {
      const fresh = await this.refresh(path);
      await this.db
        .updateTable("submissions")
        .set({
          ...urlUpdate(role, fresh),
          updated_at: this.now().toISOString(),
        })
        .where("uuid", "=", row.uuid)
        .execute();
      return true;
    } catch (error) {
      storageLogger.error(
        { uuid: row.uuid, role, path, error: errorMessage(error) },
        "Failed to refresh signed URL"
      );
      return false;
    }
  }

  private async flagUnrecoverable(
    row: ImageUrlRow,
    role: ImageRole,
    url: string
  ): Promise<void> {
    storageLogger.warn(
      { uuid: row.uuid, role, url },
      "Cannot recover storage path from URL, flagging it"
    );
    try {
      await this.db
        .updateTable("submissions")
        .set(flagUpdate(role))
        .where("uuid", "=", row.uuid)
        .execute();
    } catch (error) {
      storageLogger.error(
        { uuid: row.uuid, role, error: errorMessage(error) },
        "Failed to flag unrecoverable URL"
      );
    }
  }

  /**
   * Count stored URLs by state and role
   */
  async inspectUrls(): Promise<UrlInspection> {
    const empty = (): UrlInspection["building"] => ({
      NoUrl: 0,
      Valid: 0,
      ExpiringSoon: 0,
      Expired: 0,
      unrecoverable: 0,
    });
    const report: UrlInspection = { building: empty(), address: empty() };

    const rows = await this.db
      .selectFrom("submissions")
      .select([
        "uuid",
        "building_image_url",
        "address_image_url",
        "building_image_error",
        "address_image_error",
      ])
      .execute();

    for (const row of rows) {
      for (const role of IMAGE_ROLES) {
        report[role][this.classify(roleUrl(row, role))]++;
        if (roleError(row, role) === UNRECOVERABLE_URL) {
          report[role].unrecoverable++;
        }
      }
    }

    return report;
  }
}

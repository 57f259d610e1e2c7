import { Value } from "@sinclair/typebox/value";

import { FetchError } from "../errors.js";
import { odkLogger } from "../logger.js";
import {
  ODataPageSchema,
  SessionResponseSchema,
  type RawRecord,
} from "../types/odk.js";

import type { OdkConfig } from "../config.js";

export type FetchFn = typeof fetch;

/**
 * ODK Central client.
 *
 * OData feeds authenticate with HTTP Basic; attachment downloads use a
 * session token that is created lazily and cached for the lifetime of the
 * instance. Construct one per process and pass it down.
 */
export class OdkClient {
  private sessionToken: string | null = null;

  constructor(
    private readonly config: OdkConfig,
    private readonly fetchFn: FetchFn = fetch
  ) {}

  // ==========================================================================
  // URLs
  // ==========================================================================

  private get formPath(): string {
    return `${this.config.baseUrl}/v1/projects/${encodeURIComponent(this.config.projectId)}/forms/${encodeURIComponent(this.config.formId)}`;
  }

  get submissionsUrl(): string {
    return `${this.formPath}.svc/Submissions`;
  }

  get personDetailsUrl(): string {
    return `${this.formPath}.svc/Submissions.${this.config.repeatGroup}`;
  }

  attachmentUrl(instanceId: string, filename: string): string {
    return `${this.formPath}/submissions/${encodeURIComponent(instanceId)}/attachments/${encodeURIComponent(filename)}`;
  }

  // ==========================================================================
  // Feeds
  // ==========================================================================

  /**
   * Fetch submissions, only those submitted after `since` when given
   */
  async fetchSubmissions(since: Date | null): Promise<RawRecord[]> {
    const filter =
      since === null
        ? undefined
        : `__system/submissionDate gt ${since.toISOString()}`;

    odkLogger.info(
      { since: since?.toISOString() ?? null },
      "Fetching submissions"
    );
    return this.fetchAllPages(this.submissionsUrl, filter);
  }

  /**
   * Fetch every row of the person repeat group. Repeat tables take no
   * submission-date filter, so this is always a full read; a form without
   * the repeat group answers 404, which yields no rows.
   */
  async fetchPersonDetails(): Promise<RawRecord[]> {
    try {
      return await this.fetchAllPages(this.personDetailsUrl, undefined);
    } catch (error) {
      if (error instanceof FetchError && error.status === 404) {
        odkLogger.warn(
          { repeatGroup: this.config.repeatGroup },
          "Repeat group not found on form, treating as empty"
        );
        return [];
      }
      throw error;
    }
  }

  private async fetchAllPages(
    url: string,
    filter: string | undefined
  ): Promise<RawRecord[]> {
    const records: RawRecord[] = [];
    const pageSize = this.config.pageSize;

    for (let skip = 0; ; skip += pageSize) {
      const params = new URLSearchParams({
        $format: "json",
        $count: "true",
        $top: String(pageSize),
        $skip: String(skip),
      });
      if (filter !== undefined) params.set("$filter", filter);

      const pageUrl = `${url}?${params.toString()}`;
      const response = await this.request(pageUrl, {
        headers: { Authorization: this.basicAuth() },
      });
      const body: unknown = await response.json();

      if (!Value.Check(ODataPageSchema, body)) {
        throw new FetchError("Unexpected OData response shape", {
          url: pageUrl,
          status: response.status,
        });
      }

      records.push(...body.value);

      const total = body["@odata.count"];
      const exhausted =
        body.value.length < pageSize ||
        (total !== undefined && records.length >= total);
      if (exhausted) break;
    }

    odkLogger.debug({ url, count: records.length }, "Fetched OData feed");
    return records;
  }

  // ==========================================================================
  // Attachments
  // ==========================================================================

  /**
   * Download a submission attachment. A rejected session token is renewed
   * once before giving up.
   */
  async downloadAttachment(
    instanceId: string,
    filename: string
  ): Promise<Uint8Array> {
    const url = this.attachmentUrl(instanceId, filename);

    for (let attempt = 0; ; attempt++) {
      const token = await this.getSessionToken();
      try {
        const response = await this.request(url, {
          headers: { Authorization: `Bearer ${token}` },
        });
        return new Uint8Array(await response.arrayBuffer());
      } catch (error) {
        if (error instanceof FetchError && error.status === 401 && attempt === 0) {
          this.sessionToken = null;
          continue;
        }
        throw error;
      }
    }
  }

  private async getSessionToken(): Promise<string> {
    if (this.sessionToken !== null) return this.sessionToken;

    const url = `${this.config.baseUrl}/v1/sessions`;
    const response = await this.request(url, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({
        email: this.config.username,
        password: this.config.password,
      }),
    });
    const body: unknown = await response.json();

    if (!Value.Check(SessionResponseSchema, body)) {
      throw new FetchError("Session response carried no token", {
        url,
        status: response.status,
      });
    }

    odkLogger.debug("Created ODK Central session");
    this.sessionToken = body.token;
    return body.token;
  }

  // ==========================================================================
  // Transport
  // ==========================================================================

  private basicAuth(): string {
    const credentials = `${this.config.username}:${this.config.password}`;
    return `Basic ${Buffer.from(credentials).toString("base64")}`;
  }

  private async request(url: string, init: RequestInit): Promise<Response> {
    const method = init.method ?? "GET";
    odkLogger.debug({ method, url }, "Sending request to ODK Central");

    const startTime = performance.now();
    let response: Response;
    try {
      response = await this.fetchFn(url, init);
    } catch (error) {
      throw new FetchError(`ODK Central unreachable: ${method} ${url}`, {
        url,
        cause: error,
      });
    }
    const duration = Math.round(performance.now() - startTime);

    odkLogger.debug(
      {
        method,
        url,
        status: response.status,
        duration: `${String(duration)}ms`,
      },
      "Received response from ODK Central"
    );

    if (!response.ok) {
      throw new FetchError(
        `ODK Central request failed: ${String(response.status)} ${response.statusText}`,
        { url, status: response.status }
      );
    }

    return response;
  }
}

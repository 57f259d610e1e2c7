import { describe, it, expect } from "vitest";

import { FetchError } from "../../../src/errors.js";
import { OdkClient, type FetchFn } from "../../../src/odk/client.js";

import type { OdkConfig } from "../../../src/config.js";

const config: OdkConfig = {
  baseUrl: "https://odk.test",
  projectId: "7",
  formId: "property survey",
  username: "collector@example.test",
  password: "test-secret",
  repeatGroup: "person_details",
  pageSize: 2,
};

interface RecordedCall {
  url: string;
  init: RequestInit | undefined;
}

function scriptedFetch(responses: (Response | Error)[]): { fetchFn: FetchFn; calls: RecordedCall[] } {
  const calls: RecordedCall[] = [];
  const fetchFn: FetchFn = async (input, init) => {
    calls.push({ url: String(input), init });
    const next = responses.shift();
    if (next === undefined) throw new Error("No scripted response left");
    if (next instanceof Error) throw next;
    return next;
  };
  return { fetchFn, calls };
}

function json(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

describe("odk/client", () => {
  describe("URLs", () => {
    it("should build feed and attachment URLs with encoded segments", () => {
      const client = new OdkClient(config, scriptedFetch([]).fetchFn);

      expect(client.submissionsUrl).toBe(
        "https://odk.test/v1/projects/7/forms/property%20survey.svc/Submissions"
      );
      expect(client.personDetailsUrl).toBe(
        "https://odk.test/v1/projects/7/forms/property%20survey.svc/Submissions.person_details"
      );
      expect(client.attachmentUrl("uuid:1", "front.jpg")).toBe(
        "https://odk.test/v1/projects/7/forms/property%20survey/submissions/uuid%3A1/attachments/front.jpg"
      );
    });
  });

  describe("fetchSubmissions", () => {
    it("should page through the feed until the count is reached", async () => {
      const { fetchFn, calls } = scriptedFetch([
        json({ value: [{ __id: "a" }, { __id: "b" }], "@odata.count": 3 }),
        json({ value: [{ __id: "c" }], "@odata.count": 3 }),
      ]);
      const client = new OdkClient(config, fetchFn);

      const records = await client.fetchSubmissions(null);

      expect(records.map((record) => record.__id)).toEqual(["a", "b", "c"]);
      expect(calls).toHaveLength(2);

      const first = new URL(calls[0]?.url ?? "");
      const second = new URL(calls[1]?.url ?? "");
      expect(first.searchParams.get("$skip")).toBe("0");
      expect(second.searchParams.get("$skip")).toBe("2");
      expect(first.searchParams.get("$top")).toBe("2");
      expect(first.searchParams.has("$filter")).toBe(false);
    });

    it("should authenticate feeds with HTTP Basic", async () => {
      const { fetchFn, calls } = scriptedFetch([json({ value: [] })]);
      const client = new OdkClient(config, fetchFn);

      await client.fetchSubmissions(null);

      const expected = `Basic ${Buffer.from("collector@example.test:test-secret").toString("base64")}`;
      expect(calls[0]?.init?.headers).toEqual({ Authorization: expected });
    });

    it("should filter on submission date when a watermark is given", async () => {
      const { fetchFn, calls } = scriptedFetch([json({ value: [] })]);
      const client = new OdkClient(config, fetchFn);

      await client.fetchSubmissions(new Date("2024-03-01T00:00:00.000Z"));

      expect(new URL(calls[0]?.url ?? "").searchParams.get("$filter")).toBe(
        "__system/submissionDate gt 2024-03-01T00:00:00.000Z"
      );
    });

    it("should raise FetchError on an HTTP error status", async () => {
      const { fetchFn } = scriptedFetch([new Response("boom", { status: 500 })]);
      const client = new OdkClient(config, fetchFn);

      const error = await client.fetchSubmissions(null).catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(FetchError);
      expect(error instanceof FetchError ? error.status : undefined).toBe(500);
    });

    it("should raise FetchError without status when the server is unreachable", async () => {
      const { fetchFn } = scriptedFetch([new TypeError("fetch failed")]);
      const client = new OdkClient(config, fetchFn);

      const error = await client.fetchSubmissions(null).catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(FetchError);
      expect(error instanceof FetchError ? error.status : undefined).toBeNull();
    });

    it("should reject a body that is not an OData page", async () => {
      const { fetchFn } = scriptedFetch([json({ items: [] })]);
      const client = new OdkClient(config, fetchFn);

      await expect(client.fetchSubmissions(null)).rejects.toThrow("Unexpected OData response shape");
    });
  });

  describe("fetchPersonDetails", () => {
    it("should treat a missing repeat group as empty", async () => {
      const { fetchFn } = scriptedFetch([new Response("not found", { status: 404 })]);
      const client = new OdkClient(config, fetchFn);

      await expect(client.fetchPersonDetails()).resolves.toEqual([]);
    });

    it("should propagate other failures", async () => {
      const { fetchFn } = scriptedFetch([new Response("denied", { status: 403 })]);
      const client = new OdkClient(config, fetchFn);

      await expect(client.fetchPersonDetails()).rejects.toBeInstanceOf(FetchError);
    });
  });

  describe("downloadAttachment", () => {
    it("should create a session once and reuse its token", async () => {
      const { fetchFn, calls } = scriptedFetch([
        json({ token: "session-one" }),
        new Response(new Uint8Array([1, 2, 3])),
        new Response(new Uint8Array([4])),
      ]);
      const client = new OdkClient(config, fetchFn);

      const first = await client.downloadAttachment("uuid:1", "front.jpg");
      const second = await client.downloadAttachment("uuid:1", "plus.jpg");

      expect(first).toEqual(new Uint8Array([1, 2, 3]));
      expect(second).toEqual(new Uint8Array([4]));
      expect(calls.map((call) => call.init?.method ?? "GET")).toEqual(["POST", "GET", "GET"]);
      expect(calls[0]?.url).toBe("https://odk.test/v1/sessions");
      expect(calls[2]?.init?.headers).toEqual({ Authorization: "Bearer session-one" });
    });

    it("should renew a rejected session token once", async () => {
      const { fetchFn, calls } = scriptedFetch([
        json({ token: "stale" }),
        new Response("expired", { status: 401 }),
        json({ token: "fresh" }),
        new Response(new Uint8Array([9])),
      ]);
      const client = new OdkClient(config, fetchFn);

      await expect(client.downloadAttachment("uuid:1", "front.jpg")).resolves.toEqual(
        new Uint8Array([9])
      );
      expect(calls[3]?.init?.headers).toEqual({ Authorization: "Bearer fresh" });
    });

    it("should give up after a second 401", async () => {
      const { fetchFn } = scriptedFetch([
        json({ token: "stale" }),
        new Response("expired", { status: 401 }),
        json({ token: "still-stale" }),
        new Response("expired", { status: 401 }),
      ]);
      const client = new OdkClient(config, fetchFn);

      await expect(client.downloadAttachment("uuid:1", "front.jpg")).rejects.toBeInstanceOf(
        FetchError
      );
    });
  });
});

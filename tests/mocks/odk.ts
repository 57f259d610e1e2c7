/**
 * In-process ODK Central feed for orchestrator and route tests
 */

import { FetchError } from "../../src/errors.js";

import type { SubmissionSource } from "../../src/services/sync/orchestrator.js";
import type { RawRecord, SubmissionRecord } from "../../src/types/odk.js";

function submissionDate(record: RawRecord): number | null {
  const system = record.__system;
  if (typeof system !== "object" || system === null || !("submissionDate" in system)) {
    return null;
  }
  const value = system.submissionDate;
  return typeof value === "string" ? Date.parse(value) : null;
}

export class FakeSubmissionSource implements SubmissionSource {
  submissions: RawRecord[] = [];
  personDetails: RawRecord[] = [];
  readonly attachments = new Map<string, Uint8Array>();
  readonly sinceCalls: (Date | null)[] = [];
  submissionsError: Error | null = null;
  personDetailsError: Error | null = null;

  async fetchSubmissions(since: Date | null): Promise<RawRecord[]> {
    this.sinceCalls.push(since);
    if (this.submissionsError !== null) throw this.submissionsError;
    if (since === null) return this.submissions;

    return this.submissions.filter((record) => {
      const date = submissionDate(record);
      return date !== null && date > since.getTime();
    });
  }

  async fetchPersonDetails(): Promise<RawRecord[]> {
    if (this.personDetailsError !== null) throw this.personDetailsError;
    return this.personDetails;
  }

  async downloadAttachment(instanceId: string, filename: string): Promise<Uint8Array> {
    const bytes = this.attachments.get(`${instanceId}/${filename}`);
    if (bytes === undefined) {
      throw new FetchError(`Attachment ${filename} not found`, {
        url: `https://odk.test/attachments/${instanceId}/${filename}`,
        status: 404,
      });
    }
    return bytes;
  }
}

export function submissionRecord(
  uuid: string,
  overrides: Partial<SubmissionRecord> = {}
): SubmissionRecord {
  return {
    uuid,
    instanceId: `uuid:${uuid}`,
    submittedAt: "2024-03-05T09:30:00.000Z",
    surveyDate: null,
    propertyLocation: null,
    propertyDescription: null,
    endSection: null,
    meta: null,
    system: null,
    buildingImageFile: null,
    addressImageFile: null,
    ...overrides,
  };
}

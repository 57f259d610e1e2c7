import { basename, extname } from "node:path";

export type ImageRole = "building" | "address";

const ROLE_FOLDERS: Record<ImageRole, string> = {
  building: "building-images",
  address: "address-plus-code-images",
};

const CONTENT_TYPES: Record<string, string> = {
  ".jpg": "image/jpeg",
  ".jpeg": "image/jpeg",
  ".png": "image/png",
  ".gif": "image/gif",
  ".webp": "image/webp",
  ".heic": "image/heic",
  ".svg": "image/svg+xml",
};

/**
 * `<base>/<role folder>/<YYYY-MM>/<uuid>-<file>`, month taken from the
 * submission date so re-processing a record lands on the same key.
 */
export function imageObjectPath(
  baseFolder: string,
  role: ImageRole,
  uuid: string,
  filename: string,
  submittedAt: string | null
): string {
  const month = (submittedAt ?? new Date().toISOString()).slice(0, 7);
  return `${baseFolder}/${ROLE_FOLDERS[role]}/${month}/${uuid}-${basename(filename)}`;
}

export function placeholderPath(baseFolder: string, uuid: string): string {
  return `${baseFolder}/placeholders/${uuid}.svg`;
}

export function contentTypeFor(filename: string): string {
  return CONTENT_TYPES[extname(filename).toLowerCase()] ?? "application/octet-stream";
}

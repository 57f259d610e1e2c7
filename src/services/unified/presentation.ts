/**
 * Precomputed HTML for dashboards that render unified rows as-is
 */

export function escapeHtml(value: string): string {
  return value
    .replaceAll("&", "&amp;")
    .replaceAll('"', "&quot;")
    .replaceAll("<", "&lt;")
    .replaceAll(">", "&gt;");
}

/**
 * Linked thumbnail for an image URL; null without a URL so readers never
 * get a broken-image tag.
 */
export function imageMarkup(url: string | null, alt: string): string | null {
  if (url === null || url === "") return null;
  const href = escapeHtml(url);
  return `<a href="${href}" target="_blank" rel="noopener noreferrer"><img src="${href}" alt="${escapeHtml(alt)}" width="100%" height="100%" loading="lazy" /></a>`;
}

export interface SourceLinkTarget {
  baseUrl: string;
  projectId: string;
  formId: string;
}

/**
 * Link to the submission in the ODK Central web UI
 */
export function sourceLinkMarkup(
  target: SourceLinkTarget | null,
  instanceId: string | null
): string | null {
  if (target === null || instanceId === null) return null;
  const href = `${target.baseUrl}/#/projects/${encodeURIComponent(target.projectId)}/forms/${encodeURIComponent(target.formId)}/submissions/${encodeURIComponent(instanceId)}`;
  return `<a href="${escapeHtml(href)}" target="_blank" rel="noopener noreferrer">View in ODK</a>`;
}

export interface PresentationFields {
  building_image_html: string | null;
  address_image_html: string | null;
}

export function presentationFor(urls: {
  building_image_url: string | null;
  address_image_url: string | null;
}): PresentationFields {
  return {
    building_image_html: imageMarkup(urls.building_image_url, "Building image"),
    address_image_html: imageMarkup(urls.address_image_url, "Address plus code image"),
  };
}

function escapeXml(value: string): string {
  return value
    .replaceAll("&", "&amp;")
    .replaceAll("<", "&lt;")
    .replaceAll(">", "&gt;")
    .replaceAll('"', "&quot;");
}

/**
 * Placeholder shown for submissions that carry no building photo
 */
export function renderPlaceholderSvg(uuid: string, label = "No image available"): Uint8Array {
  const svg = [
    '<svg xmlns="http://www.w3.org/2000/svg" width="400" height="300" viewBox="0 0 400 300">',
    '<rect width="400" height="300" fill="#f0f0f0" stroke="#cccccc" stroke-width="2"/>',
    `<text x="200" y="140" font-family="Arial, sans-serif" font-size="20" fill="#666666" text-anchor="middle">${escapeXml(label)}</text>`,
    `<text x="200" y="175" font-family="Arial, sans-serif" font-size="12" fill="#999999" text-anchor="middle">${escapeXml(uuid)}</text>`,
    "</svg>",
  ].join("");

  return new TextEncoder().encode(svg);
}

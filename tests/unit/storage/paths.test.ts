import { describe, it, expect } from "vitest";

import { contentTypeFor, imageObjectPath, placeholderPath } from "../../../src/storage/paths.js";
import { renderPlaceholderSvg } from "../../../src/storage/placeholder.js";

describe("storage/paths", () => {
  it("should file images by role and submission month", () => {
    expect(
      imageObjectPath("odk_images", "building", "P1", "front.jpg", "2024-03-05T10:00:00.000Z")
    ).toBe("odk_images/building-images/2024-03/P1-front.jpg");
    expect(
      imageObjectPath("odk_images", "address", "P1", "plus.png", "2023-12-31T23:59:59.000Z")
    ).toBe("odk_images/address-plus-code-images/2023-12/P1-plus.png");
  });

  it("should strip directories from attachment names", () => {
    expect(imageObjectPath("base", "building", "P1", "media/front.jpg", "2024-01-01T00:00:00.000Z")).toBe(
      "base/building-images/2024-01/P1-front.jpg"
    );
  });

  it("should place placeholders under their own folder", () => {
    expect(placeholderPath("odk_images", "P1")).toBe("odk_images/placeholders/P1.svg");
  });

  it("should map extensions to content types case-insensitively", () => {
    expect(contentTypeFor("front.JPG")).toBe("image/jpeg");
    expect(contentTypeFor("plan.svg")).toBe("image/svg+xml");
    expect(contentTypeFor("notes.bin")).toBe("application/octet-stream");
  });
});

describe("storage/placeholder", () => {
  it("should render an SVG naming the submission", () => {
    const svg = new TextDecoder().decode(renderPlaceholderSvg("P1"));

    expect(svg.startsWith('<svg xmlns="http://www.w3.org/2000/svg"')).toBe(true);
    expect(svg).toContain(">No image available</text>");
    expect(svg).toContain(">P1</text>");
  });

  it("should escape markup in the label and key", () => {
    const svg = new TextDecoder().decode(renderPlaceholderSvg('<a&"b>', "Missing <photo>"));

    expect(svg).toContain(">Missing &lt;photo&gt;</text>");
    expect(svg).toContain(">&lt;a&amp;&quot;b&gt;</text>");
  });
});

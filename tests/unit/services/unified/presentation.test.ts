import { describe, it, expect } from "vitest";

import {
  escapeHtml,
  imageMarkup,
  presentationFor,
  sourceLinkMarkup,
} from "../../../../src/services/unified/presentation.js";

describe("services/unified/presentation", () => {
  it("should escape markup characters", () => {
    expect(escapeHtml(`a&b "c" <d>`)).toBe("a&amp;b &quot;c&quot; &lt;d&gt;");
  });

  it("should render a linked thumbnail with escaped attributes", () => {
    expect(imageMarkup("https://img.test/a.jpg?x=1&y=2", "Building image")).toBe(
      '<a href="https://img.test/a.jpg?x=1&amp;y=2" target="_blank" rel="noopener noreferrer"><img src="https://img.test/a.jpg?x=1&amp;y=2" alt="Building image" width="100%" height="100%" loading="lazy" /></a>'
    );
  });

  it("should render nothing without a URL", () => {
    expect(imageMarkup(null, "Building image")).toBeNull();
    expect(imageMarkup("", "Building image")).toBeNull();
  });

  it("should link to the submission in the web UI", () => {
    expect(
      sourceLinkMarkup({ baseUrl: "https://odk.test", projectId: "7", formId: "survey" }, "uuid:P1")
    ).toBe(
      '<a href="https://odk.test/#/projects/7/forms/survey/submissions/uuid%3AP1" target="_blank" rel="noopener noreferrer">View in ODK</a>'
    );
  });

  it("should omit the source link without a target or instance", () => {
    expect(sourceLinkMarkup(null, "uuid:P1")).toBeNull();
    expect(sourceLinkMarkup({ baseUrl: "https://odk.test", projectId: "7", formId: "survey" }, null)).toBeNull();
  });

  it("should build both image fields", () => {
    const fields = presentationFor({ building_image_url: null, address_image_url: "https://img.test/b.png" });

    expect(fields.building_image_html).toBeNull();
    expect(fields.address_image_html).toContain('alt="Address plus code image"');
  });
});

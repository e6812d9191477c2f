import { describe, expect, it } from "vitest";
import { INITIAL_PUBLISH_FIELDS, publishStateOf, resolvePublishTransition } from "../src/cms/publish-state";

const firstPublish = new Date("2026-03-01T09:00:00.000Z");
const later = new Date("2026-03-02T10:30:00.000Z");

describe("resolvePublishTransition", () => {
  it("stamps publishedAt when a draft is published", () => {
    expect(resolvePublishTransition(INITIAL_PUBLISH_FIELDS, true, firstPublish)).toEqual({
      isPublished: true,
      publishedAt: "2026-03-01T09:00:00.000Z",
      transition: "publish"
    });
  });

  it("keeps the first publishedAt when publishing again", () => {
    const published = { isPublished: true, publishedAt: "2026-03-01T09:00:00.000Z" };

    expect(resolvePublishTransition(published, true, later)).toEqual({ ...published, transition: "none" });
  });

  it("clears publishedAt on unpublish", () => {
    const published = { isPublished: true, publishedAt: "2026-03-01T09:00:00.000Z" };

    expect(resolvePublishTransition(published, false, later)).toEqual({
      isPublished: false,
      publishedAt: null,
      transition: "unpublish"
    });
  });

  it("treats unpublishing a draft as a no-op", () => {
    expect(resolvePublishTransition(INITIAL_PUBLISH_FIELDS, false, later)).toEqual({
      isPublished: false,
      publishedAt: null,
      transition: "none"
    });
  });

  it("leaves the fields untouched when no change is requested", () => {
    const published = { isPublished: true, publishedAt: "2026-03-01T09:00:00.000Z" };

    expect(resolvePublishTransition(published, undefined, later)).toEqual({ ...published, transition: "none" });
  });

  it("stamps a fresh time when republishing after an unpublish", () => {
    const published = resolvePublishTransition(INITIAL_PUBLISH_FIELDS, true, firstPublish);
    const draft = resolvePublishTransition(published, false, later);
    const republished = resolvePublishTransition(draft, true, later);

    expect(republished.publishedAt).toBe("2026-03-02T10:30:00.000Z");
  });
});

describe("publishStateOf", () => {
  it("maps the flag onto the two states", () => {
    expect(publishStateOf({ isPublished: false })).toBe("draft");
    expect(publishStateOf({ isPublished: true })).toBe("published");
  });
});

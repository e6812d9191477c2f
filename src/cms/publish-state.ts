export type PublishState = "draft" | "published";
export type PublishTransition = "publish" | "unpublish" | "none";

export interface PublishFields {
  isPublished: boolean;
  publishedAt: string | null;
}

export interface PublishResolution extends PublishFields {
  transition: PublishTransition;
}

export const INITIAL_PUBLISH_FIELDS: PublishFields = { isPublished: false, publishedAt: null };

export function publishStateOf(fields: Pick<PublishFields, "isPublished">): PublishState {
  return fields.isPublished ? "published" : "draft";
}

/**
 * Draft -> Published stamps `publishedAt`, Published -> Draft clears it, and
 * every self-transition (or an absent request) leaves both fields untouched.
 */
export function resolvePublishTransition(
  current: PublishFields,
  requestedPublished: boolean | undefined,
  now: Date = new Date()
): PublishResolution {
  if (requestedPublished === undefined || requestedPublished === current.isPublished) {
    return { ...current, transition: "none" };
  }

  if (requestedPublished) {
    return { isPublished: true, publishedAt: now.toISOString(), transition: "publish" };
  }

  return { isPublished: false, publishedAt: null, transition: "unpublish" };
}

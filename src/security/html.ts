import sanitizeHtml from "sanitize-html";

export const ARTICLE_ALLOWED_TAGS = [
  "p",
  "br",
  "strong",
  "em",
  "ul",
  "ol",
  "li",
  "h1",
  "h2",
  "h3",
  "h4",
  "h5",
  "h6",
  "blockquote",
  "a",
  "img"
];

export const ARTICLE_ALLOWED_ATTRIBUTES: Record<string, string[]> = {
  a: ["href", "title"],
  img: ["src", "alt", "title", "width", "height"]
};

export function sanitizeArticleHtml(input: string): string {
  if (!input) {
    return "";
  }

  return sanitizeHtml(input, {
    allowedTags: ARTICLE_ALLOWED_TAGS,
    allowedAttributes: ARTICLE_ALLOWED_ATTRIBUTES,
    allowedSchemes: ["http", "https", "mailto"],
    allowedSchemesByTag: {
      img: ["http", "https"]
    },
    allowProtocolRelative: false
  });
}

const CONTROL_CHARACTERS = /[\u0000-\u001f\u007f]/g;

export function sanitizeString(value: string | null | undefined, maxLength = 255): string {
  if (!value) {
    return "";
  }

  const sanitized = value.replace(CONTROL_CHARACTERS, "").trim();
  return sanitized.length > maxLength ? sanitized.slice(0, maxLength) : sanitized;
}

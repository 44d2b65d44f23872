import sanitizeHtml from 'sanitize-html';

export type Sanitizer = (raw: string) => string;

/**
 * Strips every tag and attribute, keeps the text entity-escaped.
 * `script` and `style` bodies are dropped along with their tags.
 */
export function createHtmlSanitizer(): Sanitizer {
  const options: sanitizeHtml.IOptions = {
    allowedTags: [],
    allowedAttributes: {},
    disallowedTagsMode: 'discard',
  };
  return (raw) => sanitizeHtml(raw, options);
}

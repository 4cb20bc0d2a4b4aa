/**
 * HTML escaping utilities for SSR
 */

// HTML5 void elements that don't have closing tags
export const VOID_ELEMENTS = new Set([
  'area',
  'base',
  'br',
  'col',
  'embed',
  'hr',
  'img',
  'input',
  'link',
  'meta',
  'param',
  'source',
  'track',
  'wbr',
]);

const TEXT_ESCAPE_TEST_RE = /[&<>]/;
const TEXT_ESCAPE_RE = /[&<>]/g;
const ATTR_ESCAPE_TEST_RE = /[&"'<>]/;
const ATTR_ESCAPE_RE = /[&"'<>]/g;
const SCRIPT_JSON_RE = /[<>&\u2028\u2029]/g;

function mapTextEscape(ch: string): string {
  switch (ch) {
    case '&':
      return '&amp;';
    case '<':
      return '&lt;';
    default:
      return '&gt;';
  }
}

function mapAttrEscape(ch: string): string {
  switch (ch) {
    case '&':
      return '&amp;';
    case '"':
      return '&quot;';
    case "'":
      return '&#x27;';
    case '<':
      return '&lt;';
    default:
      return '&gt;';
  }
}

/**
 * Escape HTML special characters in text content
 */
export function escapeText(text: string): string {
  if (!TEXT_ESCAPE_TEST_RE.test(text)) return text;
  return text.replace(TEXT_ESCAPE_RE, mapTextEscape);
}

/**
 * Escape HTML special characters in attribute values
 */
export function escapeAttr(value: string): string {
  if (!ATTR_ESCAPE_TEST_RE.test(value)) return value;
  return value.replace(ATTR_ESCAPE_RE, mapAttrEscape);
}

/**
 * Make JSON safe to inline in a `<script>` element: no sequence in the
 * output can close the element or open a comment. The result is still valid
 * JSON that parses to the same value.
 */
export function escapeJsonForScript(json: string): string {
  return json.replace(
    SCRIPT_JSON_RE,
    (ch) => `\\u${ch.charCodeAt(0).toString(16).padStart(4, '0')}`
  );
}

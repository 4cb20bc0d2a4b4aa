/**
 * Host attribute mapping shared by the HTML serializer and the DOM renderer,
 * so server markup and client patches agree on every attribute.
 */

import type { PropValue } from '../tree/node';

/** Attribute carrying a node's hydration marker id in server markup */
export const MARKER_ATTR = 'data-hk';

/** `true` renders a bare boolean attribute */
export type AttrValue = string | true;

const ATTR_NAME_RE = /^[a-zA-Z_:][a-zA-Z0-9_.:-]*$/;
const TAG_NAME_RE = /^[a-zA-Z][a-zA-Z0-9-]*$/;

const CSS_UNSAFE_RE = /[{}<>\\;]/g;
const CSS_DANGEROUS_FN_RE = /(?:url|expression|javascript)\s*\(/i;

export function isValidTagName(name: string): boolean {
  return TAG_NAME_RE.test(name);
}

function toKebab(prop: string): string {
  return prop.replace(/[A-Z]/g, (m) => `-${m.toLowerCase()}`);
}

/**
 * Strip characters that could break out of a CSS declaration; values calling
 * url()/expression() are dropped entirely.
 */
function sanitizeCssValue(value: string): string {
  if (CSS_DANGEROUS_FN_RE.test(value)) return '';
  return value.replace(CSS_UNSAFE_RE, '');
}

export function styleToCss(style: Readonly<Record<string, PropValue>>): string {
  let out = '';
  for (const [prop, value] of Object.entries(style)) {
    if (value === null || value === false || typeof value === 'object') continue;
    const safe = sanitizeCssValue(String(value));
    if (safe) out += `${toKebab(prop)}:${safe};`;
  }
  return out;
}

function isStyleObject(
  value: PropValue
): value is Readonly<Record<string, PropValue>> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Attribute value for one prop, or null when the prop renders no attribute.
 */
export function attributeValue(name: string, value: PropValue): AttrValue | null {
  if (value === null || value === false) return null;
  if (value === true) return true;
  if (name === 'style') {
    if (typeof value === 'string') return value || null;
    if (!isStyleObject(value)) return null;
    return styleToCss(value) || null;
  }
  if (typeof value === 'object') return JSON.stringify(value);
  return String(value);
}

export function attributeName(prop: string): string | null {
  const name = prop === 'className' ? 'class' : prop;
  return ATTR_NAME_RE.test(name) ? name : null;
}

export function toAttributes(
  props: Readonly<Record<string, PropValue>>
): Array<[string, AttrValue]> {
  const out: Array<[string, AttrValue]> = [];
  for (const [prop, value] of Object.entries(props)) {
    const name = attributeName(prop);
    if (name === null || name === MARKER_ATTR) continue;
    const attr = attributeValue(name, value);
    if (attr !== null) out.push([name, attr]);
  }
  return out;
}

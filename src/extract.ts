import { ParseError, ValidationError } from './errors.js';

export type TokenRule =
  | { kind: 'input'; name: string }
  | { kind: 'attribute'; attribute: string }
  | { kind: 'regex'; pattern: RegExp };

export const DEFAULT_TOKEN_FORMAT = /^[0-9A-Za-z]+$/;

const ENTITIES: Record<string, string> = {
  '&amp;': '&',
  '&lt;': '<',
  '&gt;': '>',
  '&quot;': '"',
  '&#39;': "'",
  '&#x27;': "'",
};

export function decodeEntities(s: string): string {
  return s.replace(/&(?:amp|lt|gt|quot|#39|#x27);/g, m => ENTITIES[m] ?? m);
}

function escapeRegex(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Attributes of a single start tag, keyed by lower-cased name.
 * Handles double-quoted, single-quoted and bare values in any order.
 */
export function parseAttributes(tag: string): Map<string, string> {
  const attrs = new Map<string, string>();
  const re = /([^\s"'<>\/=]+)(?:\s*=\s*(?:"([^"]*)"|'([^']*)'|([^\s"'=<>`]+)))?/g;
  const body = tag.replace(/^<\s*[^\s>\/]+/, '').replace(/\/?>$/, '');
  for (const m of body.matchAll(re)) {
    const name = (m[1] ?? '').toLowerCase();
    if (!name || attrs.has(name)) continue;
    attrs.set(name, decodeEntities(m[2] ?? m[3] ?? m[4] ?? ''));
  }
  return attrs;
}

export function findInputValue(html: string, name: string): string | null {
  for (const m of html.matchAll(/<input\b[^>]*>/gi)) {
    const attrs = parseAttributes(m[0]);
    if (attrs.get('name') === name) return attrs.get('value') ?? '';
  }
  return null;
}

export function findAttributeValue(html: string, attribute: string): string | null {
  const needle = new RegExp(`\\s${escapeRegex(attribute)}\\s*=`, 'i');
  for (const m of html.matchAll(/<[a-z][^>]*>/gi)) {
    if (!needle.test(m[0])) continue;
    const v = parseAttributes(m[0]).get(attribute.toLowerCase());
    if (v !== undefined) return v;
  }
  return null;
}

export function parseTokenRule(text: string): TokenRule {
  const s = text.trim();
  const sep = s.indexOf(':');
  const kind = sep > 0 ? s.slice(0, sep).toLowerCase() : '';
  const body = sep > 0 ? s.slice(sep + 1).trim() : '';
  if (!body) throw new ValidationError(`invalid token rule "${text}": expected input:<name>, attr:<attribute> or regex:<pattern>`);
  switch (kind) {
    case 'input':
      return { kind: 'input', name: body };
    case 'attr':
      return { kind: 'attribute', attribute: body };
    case 'regex':
      try {
        return { kind: 'regex', pattern: new RegExp(body) };
      } catch (e) {
        throw new ValidationError(`invalid token rule regex "${body}"`, { cause: e });
      }
    default:
      throw new ValidationError(`unknown token rule kind "${kind || s}"`);
  }
}

export function describeRule(rule: TokenRule): string {
  switch (rule.kind) {
    case 'input':
      return `<input name="${rule.name}">`;
    case 'attribute':
      return `[${rule.attribute}]`;
    case 'regex':
      return `/${rule.pattern.source}/`;
  }
}

function applyRule(html: string, rule: TokenRule): string | null {
  switch (rule.kind) {
    case 'input':
      return findInputValue(html, rule.name);
    case 'attribute':
      return findAttributeValue(html, rule.attribute);
    case 'regex': {
      const m = html.match(rule.pattern);
      if (!m) return null;
      return m[1] ?? m[0];
    }
  }
}

export function extractToken(html: string, rule: TokenRule, format: RegExp = DEFAULT_TOKEN_FORMAT): string {
  const raw = applyRule(html, rule);
  if (raw === null) {
    throw new ParseError(`token element ${describeRule(rule)} not found, the portal layout may have changed`);
  }
  const token = raw.trim();
  if (!token) throw new ParseError(`token element ${describeRule(rule)} is empty`);
  if (!format.test(token)) {
    throw new ParseError(`token "${token}" does not match the expected format /${format.source}/`);
  }
  return token;
}

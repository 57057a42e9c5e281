/**
 * Security helpers shared by the HTML emitter and the CSRF helper.
 */

import * as crypto from 'crypto';

// ─── HTML / XSS Prevention ──────────────────────────────────────────

const HTML_ESCAPE_MAP: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

/**
 * Escapes HTML special characters. Safe for both element text and
 * double-quoted attribute values.
 */
export function escapeHtml(str: string): string {
  return str.replace(/[&<>"']/g, (ch) => HTML_ESCAPE_MAP[ch] ?? ch);
}

const ATTRIBUTE_NAME_RE = /^[^\s"'<>\/=\u0000-\u001f\u007f]+$/;

/**
 * Returns true if `name` may be written as an attribute name without
 * breaking out of the tag.
 */
export function isValidAttributeName(name: string): boolean {
  return ATTRIBUTE_NAME_RE.test(name);
}

// ─── Tokens ─────────────────────────────────────────────────────────

/**
 * Constant-time string comparison.
 */
export function timingSafeEqual(a: string, b: string): boolean {
  const left = Buffer.from(a);
  const right = Buffer.from(b);
  if (left.length !== right.length) {
    // Still do a comparison so the length check is not the only timing signal
    crypto.timingSafeEqual(left, left);
    return false;
  }
  return crypto.timingSafeEqual(left, right);
}

/**
 * Random URL-safe token of `bytes` bytes of entropy.
 */
export function generateToken(bytes = 32): string {
  return crypto.randomBytes(bytes).toString('base64url');
}

/**
 * Short, non-reversible label for a secret such as a session id, for logs.
 */
export function fingerprint(value: string): string {
  return crypto.createHash('sha256').update(value).digest('hex').slice(0, 12);
}

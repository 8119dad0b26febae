import { createHmac, timingSafeEqual } from 'crypto';
import { AuthenticationError } from '../errors';

export type WebhookHeaders = Record<string, string | undefined>;

const SIGNATURE_HEADERS = ['x-hub-signature', 'x-signature'];

function safeEqual(left: string, right: string): boolean {
  const a = Buffer.from(left);
  const b = Buffer.from(right);
  return a.length === b.length && timingSafeEqual(a, b);
}

/** Lower-cases header names and keeps the first value of repeated headers. */
export function normalizeHeaders(headers: Record<string, string | string[] | undefined | null>): WebhookHeaders {
  const normalized: WebhookHeaders = {};
  for (const [name, value] of Object.entries(headers)) {
    const first = Array.isArray(value) ? value[0] : value;
    if (typeof first === 'string') {
      normalized[name.toLowerCase()] = first;
    }
  }
  return normalized;
}

export function isValidSignature(rawBody: string, signature: string, secret: string): boolean {
  const provided = signature.trim().replace(/^sha256=/i, '').toLowerCase();
  const expected = createHmac('sha256', secret).update(rawBody, 'utf8').digest('hex');
  return safeEqual(provided, expected);
}

function sharedSecretFrom(headers: WebhookHeaders): string | null {
  const direct = headers['x-webhook-secret']?.trim();
  if (direct) {
    return direct;
  }
  const match = /^Bearer\s+(.+)$/i.exec(headers.authorization?.trim() || '');
  return match ? match[1].trim() : null;
}

/**
 * Accepts either an HMAC-SHA256 signature of the raw body or the shared
 * secret itself. An empty secret disables the check.
 */
export function verifyWebhookAuth(rawBody: string, headers: WebhookHeaders, secret: string): void {
  if (!secret) {
    return;
  }

  for (const name of SIGNATURE_HEADERS) {
    const signature = headers[name];
    if (signature && isValidSignature(rawBody, signature, secret)) {
      return;
    }
  }

  const shared = sharedSecretFrom(headers);
  if (shared && safeEqual(shared, secret)) {
    return;
  }

  throw new AuthenticationError('Invalid webhook signature');
}

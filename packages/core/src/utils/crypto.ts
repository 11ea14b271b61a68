/**
 * Cryptographic Utilities for KeyGate
 *
 * Security considerations:
 * - Uses Node.js built-in crypto module for randomness
 * - Bearer tokens and compact JWTs are scrubbed before anything is logged
 */

import { randomBytes } from 'node:crypto';

/**
 * Generate a UUID v7 (time-sortable)
 * Based on RFC 9562
 */
export function uuidv7(): string {
  const timestamp = Date.now();
  const random = randomBytes(10);

  // Timestamp in 48 bits (6 bytes)
  const timestampBytes = Buffer.alloc(6);
  timestampBytes.writeUIntBE(timestamp, 0, 6);

  const uuid = Buffer.alloc(16);
  timestampBytes.copy(uuid, 0);

  // version (4 bits) + rand_a (12 bits)
  uuid[6] = 0x70 | (random[0]! & 0x0f);
  uuid[7] = random[1]!;

  // variant (2 bits) + rand_b (62 bits)
  uuid[8] = 0x80 | (random[2]! & 0x3f);
  random.copy(uuid, 9, 3, 10);

  const hex = uuid.toString('hex');
  return `${hex.slice(0, 8)}-${hex.slice(8, 12)}-${hex.slice(12, 16)}-${hex.slice(16, 20)}-${hex.slice(20)}`;
}

const SECRET_PATTERNS: { regex: RegExp; replacement: string }[] = [
  { regex: /bearer\s+[a-zA-Z0-9-_.~+/]+=*/gi, replacement: 'Bearer [REDACTED_TOKEN]' },
  // Compact JWS: base64url header starting with {"  ->  eyJ
  {
    regex: /eyJ[a-zA-Z0-9-_]+\.[a-zA-Z0-9-_]+\.[a-zA-Z0-9-_]*/g,
    replacement: '[REDACTED_JWT]',
  },
  { regex: /password["\s:=]+["']?[^"'\s]{1,}["']?/gi, replacement: '[REDACTED_PASSWORD]' },
  {
    regex: /-----BEGIN[^-]+PRIVATE KEY-----[\s\S]*?-----END[^-]+PRIVATE KEY-----/g,
    replacement: '[REDACTED_PRIVATE_KEY]',
  },
];

const SENSITIVE_KEYS = ['password', 'secret', 'token', 'authorization', 'cookie'];

/**
 * Sanitize a value for safe logging (remove potential secrets)
 */
export function sanitizeForLogging(input: unknown): unknown {
  if (input === null || input === undefined) {
    return input;
  }

  if (typeof input === 'string') {
    let sanitized = input;
    for (const { regex, replacement } of SECRET_PATTERNS) {
      sanitized = sanitized.replace(regex, replacement);
    }
    return sanitized;
  }

  if (Array.isArray(input)) {
    return input.map(sanitizeForLogging);
  }

  if (input instanceof Error) {
    return { name: input.name, message: sanitizeForLogging(input.message) };
  }

  if (typeof input === 'object') {
    const sanitized: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(input)) {
      const lowerKey = key.toLowerCase();
      if (SENSITIVE_KEYS.some((s) => lowerKey.includes(s))) {
        sanitized[key] = '[REDACTED]';
      } else {
        sanitized[key] = sanitizeForLogging(value);
      }
    }
    return sanitized;
  }

  return input;
}

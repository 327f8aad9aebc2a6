/**
 * @module credentials/secret-generator
 * Cryptographically random secrets from two interchangeable sources.
 *
 * Both generators draw uniformly from the same alphabet, so whichever one is
 * available produces a secret of identical strength.
 */

import crypto from 'node:crypto';
import { DeployError } from '../resilience/error-codes.js';

export type SecretAlphabet = 'alphanumeric' | 'hex';

export interface SecretGenerator {
  readonly name: string;
  available(): boolean;
  generate(length: number, alphabet: SecretAlphabet): string;
}

const ALPHANUMERIC = 'ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789';
const HEX = '0123456789abcdef';

export const MAX_SECRET_LENGTH = 4096;

// =====================================================================
// Generators
// =====================================================================

/**
 * Base64 of random bytes with `=`, `+` and `/` removed. Every remaining
 * character is uniform over the 62 alphanumerics.
 */
export const randomBytesGenerator: SecretGenerator = {
  name: 'random-bytes',
  available: () => typeof crypto.randomBytes === 'function',
  generate(length, alphabet) {
    if (alphabet === 'hex') {
      return crypto.randomBytes(Math.ceil(length / 2)).toString('hex').slice(0, length);
    }
    let out = '';
    while (out.length < length) {
      out += crypto.randomBytes(Math.max(48, length)).toString('base64').replace(/[=+/]/g, '');
    }
    return out.slice(0, length);
  },
};

/** Rejection sampling over `getRandomValues`, so no character is biased. */
export const webCryptoGenerator: SecretGenerator = {
  name: 'web-crypto',
  available: () => typeof globalThis.crypto?.getRandomValues === 'function',
  generate(length, alphabet) {
    const chars = alphabet === 'hex' ? HEX : ALPHANUMERIC;
    const limit = 256 - (256 % chars.length);
    const buffer = new Uint8Array(Math.max(64, length * 2));
    let out = '';
    while (out.length < length) {
      globalThis.crypto.getRandomValues(buffer);
      for (const byte of buffer) {
        if (byte < limit) out += chars[byte % chars.length];
        if (out.length === length) break;
      }
    }
    return out;
  },
};

export const DEFAULT_GENERATORS: readonly SecretGenerator[] = [randomBytesGenerator, webCryptoGenerator];

// =====================================================================
// generateSecret
// =====================================================================

/**
 * Generate a secret with the first available generator, falling back to the
 * next one when a generator is unavailable or throws.
 *
 * @throws {DeployError} VALIDATION_FAILED for a bad length,
 *   ENTROPY_UNAVAILABLE when no generator works
 */
export function generateSecret(
  length = 32,
  alphabet: SecretAlphabet = 'alphanumeric',
  generators: readonly SecretGenerator[] = DEFAULT_GENERATORS,
): string {
  if (!Number.isInteger(length) || length < 1 || length > MAX_SECRET_LENGTH) {
    throw new DeployError('VALIDATION_FAILED', `Secret length must be an integer between 1 and ${MAX_SECRET_LENGTH}`, { length });
  }

  const failures: string[] = [];
  for (const generator of generators) {
    if (!generator.available()) {
      failures.push(`${generator.name}: unavailable`);
      continue;
    }
    try {
      const value = generator.generate(length, alphabet);
      if (value.length === length) return value;
      failures.push(`${generator.name}: produced ${value.length} characters`);
    } catch (err) {
      failures.push(`${generator.name}: ${err instanceof Error ? err.message : String(err)}`);
    }
  }

  throw new DeployError('ENTROPY_UNAVAILABLE', 'No random source could generate a secret', { failures });
}

/** Random key material as base64, e.g. for `APP_KEY=base64:...`. */
export function generateKeyMaterial(bytes = 32): string {
  try {
    return crypto.randomBytes(bytes).toString('base64');
  } catch (err) {
    throw new DeployError('ENTROPY_UNAVAILABLE', 'No random source could generate key material', {
      cause: err instanceof Error ? err.message : String(err),
    });
  }
}

/**
 * @module certificates/domain
 * Whether a host name can be issued a certificate by a public authority.
 */

import { isIP } from 'node:net';

const RESERVED_SUFFIXES = ['.local', '.test', '.example', '.invalid', '.localhost'] as const;
const LOOPBACK_NAMES = new Set(['localhost', '127.0.0.1', '::1']);
const LABEL = /^[a-z0-9]([a-z0-9-]{0,61}[a-z0-9])?$/;

export type IneligibleReason = 'empty' | 'loopback' | 'ip_literal' | 'reserved_suffix' | 'single_label' | 'malformed';

/** Reason a host is refused, or `null` when it is eligible. */
export function ineligibilityReason(host: string): IneligibleReason | null {
  const name = host.trim().toLowerCase().replace(/\.$/, '');
  if (name.length === 0) return 'empty';
  if (LOOPBACK_NAMES.has(name)) return 'loopback';
  if (isIP(name.replace(/^\[|\]$/g, '')) !== 0) return 'ip_literal';
  if (RESERVED_SUFFIXES.some((suffix) => name.endsWith(suffix))) return 'reserved_suffix';
  if (!name.includes('.')) return 'single_label';
  if (name.length > 253 || !name.split('.').every((label) => LABEL.test(label))) return 'malformed';
  return null;
}

/**
 * Loopback names, IP literals, reserved suffixes and single-label hosts are
 * rejected. Checked before the authority is ever contacted.
 */
export function isEligibleDomain(host: string): boolean {
  return ineligibilityReason(host) === null;
}

export function describeIneligibility(reason: IneligibleReason): string {
  switch (reason) {
    case 'empty':
      return 'no host name was given';
    case 'loopback':
      return 'loopback addresses cannot be issued public certificates';
    case 'ip_literal':
      return 'IP addresses cannot be issued certificates; use a DNS name';
    case 'reserved_suffix':
      return `reserved suffixes (${RESERVED_SUFFIXES.join(', ')}) are not publicly resolvable`;
    case 'single_label':
      return 'single-label host names have no public zone';
    case 'malformed':
      return 'the host name is not a valid DNS name';
  }
}

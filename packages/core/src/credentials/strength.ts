/**
 * @module credentials/strength
 * Password strength classification.
 *
 * The denylist is consulted first: a listed value is weak at any length.
 * Otherwise the class depends on length against the deployment mode.
 */

import type { DeploymentMode, StrengthClass } from '../types.js';

/** Placeholder and default values shipped in templates and tutorials. */
export const WEAK_VALUES: ReadonlySet<string> = new Set([
  'trustanchor_dev',
  'trustanchor',
  'password',
  'password123',
  'admin',
  'admin123',
  'postgres',
  'root',
  '123456',
  '12345678',
  'secret',
  'changeme',
  'change_me',
  'change_me_to_a_secure_password',
  'your_secure_password_here',
  'your_password_here',
  'please_change_this_password_now',
]);

export const PRODUCTION_MIN_LENGTH = 20;
export const DEVELOPMENT_MIN_LENGTH = 12;

export interface StrengthAssessment {
  strength: StrengthClass;
  /** Human-readable notes, e.g. why a value is weak */
  warnings: string[];
}

export function isDenylisted(value: string): boolean {
  return WEAK_VALUES.has(value.trim().toLowerCase());
}

export function assessStrength(value: string, context: DeploymentMode): StrengthAssessment {
  if (isDenylisted(value)) {
    return { strength: 'weak', warnings: ['value is a known default or placeholder'] };
  }

  const warnings: string[] = [];
  if (!/[0-9]/.test(value)) warnings.push('value contains no digits');
  if (!/[A-Za-z]/.test(value)) warnings.push('value contains no letters');

  if (value.length >= PRODUCTION_MIN_LENGTH) {
    return { strength: 'strong', warnings };
  }
  if (context === 'development' && value.length >= DEVELOPMENT_MIN_LENGTH) {
    warnings.unshift(`shorter than ${PRODUCTION_MIN_LENGTH} characters; acceptable for development only`);
    return { strength: 'acceptable', warnings };
  }

  const floor = context === 'production' ? PRODUCTION_MIN_LENGTH : DEVELOPMENT_MIN_LENGTH;
  warnings.unshift(`shorter than ${floor} characters`);
  return { strength: 'weak', warnings };
}

export function classifyStrength(value: string, context: DeploymentMode): StrengthClass {
  return assessStrength(value, context).strength;
}

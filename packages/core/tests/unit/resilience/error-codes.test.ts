/**
 * Unit tests for resilience/error-codes: registry, factory, outcome
 * helpers and DeployError.
 */

import { describe, it, expect } from 'vitest';
import {
  DeployError,
  ERROR_METADATA,
  createStructuredError,
  fail,
  failWith,
  succeed,
  toStructuredError,
  type ErrorCode,
} from '../../../src/resilience/error-codes.js';

const ALL_CODES: ErrorCode[] = [
  'CONFIGURATION_ERROR',
  'DEPENDENCY_UNREADY',
  'VALIDATION_FAILED',
  'EXTERNAL_TOOL_FAILURE',
  'VERIFICATION_FAILED',
  'ENTROPY_UNAVAILABLE',
  'DOCKER_UNAVAILABLE',
  'DISK_SPACE_LOW',
  'PORT_CONFLICT',
  'CONFIRMATION_MISMATCH',
];

describe('ERROR_METADATA', () => {
  it('has remediation for every code', () => {
    expect(ERROR_METADATA.size).toBe(ALL_CODES.length);
    for (const code of ALL_CODES) {
      expect(ERROR_METADATA.get(code)?.suggestedActions.length).toBeGreaterThan(0);
    }
  });
});

describe('createStructuredError', () => {
  it('fills category, severity and actions from the registry', () => {
    const error = createStructuredError('PORT_CONFLICT', 'port 80 busy', { port: 80 });
    expect(error).toMatchObject({
      code: 'PORT_CONFLICT',
      category: 'infrastructure',
      severity: 'warning',
      message: 'port 80 busy',
      details: { port: 80 },
      suggestedActions: ['Stop the process holding the port', 'Change the published port in the compose file'],
    });
  });

  it('honours a severity override', () => {
    expect(createStructuredError('VALIDATION_FAILED', 'weak', {}, 'warning').severity).toBe('warning');
  });

  it('copies the action list', () => {
    const error = createStructuredError('CONFIRMATION_MISMATCH', 'no');
    error.suggestedActions.push('mutated');
    expect(ERROR_METADATA.get('CONFIRMATION_MISMATCH')?.suggestedActions).toHaveLength(1);
  });
});

describe('Outcome helpers', () => {
  it('succeed carries warnings', () => {
    expect(succeed(3, ['careful'])).toEqual({ ok: true, value: 3, warnings: ['careful'] });
  });

  it('fail and failWith produce the failure branch', () => {
    const failed = fail('DEPENDENCY_UNREADY', 'redis', { service: 'redis' });
    expect(failed.ok).toBe(false);
    if (failed.ok) return;
    expect(failWith(failed.error)).toEqual({ ok: false, error: failed.error });
  });
});

describe('DeployError', () => {
  it('exposes code, severity and its payload', () => {
    const err = new DeployError('ENTROPY_UNAVAILABLE', 'no random source');
    expect(err).toBeInstanceOf(Error);
    expect(err.name).toBe('DeployError');
    expect(err.code).toBe('ENTROPY_UNAVAILABLE');
    expect(err.severity).toBe('fatal');
    expect(JSON.parse(JSON.stringify(err))).toMatchObject({ code: 'ENTROPY_UNAVAILABLE', message: 'no random source' });
  });
});

describe('toStructuredError', () => {
  it('unwraps a DeployError', () => {
    const err = new DeployError('CONFIGURATION_ERROR', 'bad file');
    expect(toStructuredError(err)).toBe(err.structuredError);
  });

  it('wraps other values under the fallback code', () => {
    expect(toStructuredError(new Error('boom')).code).toBe('EXTERNAL_TOOL_FAILURE');
    expect(toStructuredError('plain', 'VALIDATION_FAILED')).toMatchObject({ code: 'VALIDATION_FAILED', message: 'plain' });
  });
});

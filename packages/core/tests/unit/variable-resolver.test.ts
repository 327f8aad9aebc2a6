/**
 * Unit tests for variable-resolver module.
 *
 * Tests cover:
 * - Built-in variables (timestamp, date)
 * - {{env.XXX}} and {{config.xxx}} substitution
 * - Preservation of unresolved placeholders
 * - Recursive resolution of objects and arrays
 */

import { describe, it, expect } from 'vitest';
import {
  findUnresolved,
  resolveObjectVariables,
  resolveVariables,
  type VariableContext,
} from '../../src/variable-resolver.js';

function makeContext(overrides?: Partial<VariableContext>): VariableContext {
  return { config: {}, env: {}, ...overrides };
}

describe('variable-resolver', () => {
  describe('resolveVariables', () => {
    it('should resolve {{timestamp}} to a numeric string', () => {
      const ts = Number(resolveVariables('{{timestamp}}', makeContext()));
      expect(ts).toBeGreaterThan(0);
      expect(ts).toBeLessThanOrEqual(Date.now());
    });

    it('should resolve {{date}} to YYYY-MM-DD format', () => {
      expect(resolveVariables('{{date}}', makeContext())).toMatch(/^\d{4}-\d{2}-\d{2}$/);
    });

    it('should resolve env and config values', () => {
      const ctx = makeContext({ env: { HOST: 'ta.example.org' }, config: { certPath: '/etc/cert.pem' } });
      expect(resolveVariables('server_name {{env.HOST}}; cert {{ config.certPath }};', ctx)).toBe(
        'server_name ta.example.org; cert /etc/cert.pem;',
      );
    });

    it('should keep undefined and empty env values as placeholders', () => {
      const ctx = makeContext({ env: { EMPTY: '' } });
      expect(resolveVariables('{{env.MISSING}}/{{env.EMPTY}}', ctx)).toBe('{{env.MISSING}}/{{env.EMPTY}}');
    });

    it('should keep unknown expressions', () => {
      expect(resolveVariables('{{ other }}', makeContext())).toBe('{{other}}');
    });
  });

  describe('resolveObjectVariables', () => {
    it('should resolve strings in nested objects and arrays', () => {
      const ctx = makeContext({ env: { TARGET: 'fed_testnet' } });
      const input = { deployment: { networkTarget: '{{env.TARGET}}', tags: ['{{env.TARGET}}', 3] }, enabled: true };
      expect(resolveObjectVariables(input, ctx)).toEqual({
        deployment: { networkTarget: 'fed_testnet', tags: ['fed_testnet', 3] },
        enabled: true,
      });
    });

    it('should return primitives as-is', () => {
      expect(resolveObjectVariables(null, makeContext())).toBeNull();
      expect(resolveObjectVariables(42, makeContext())).toBe(42);
    });
  });

  describe('findUnresolved', () => {
    it('should list remaining placeholders', () => {
      expect(findUnresolved('{{env.A}}-x-{{ config.b }}')).toEqual(['env.A', 'config.b']);
      expect(findUnresolved('plain')).toEqual([]);
    });
  });
});

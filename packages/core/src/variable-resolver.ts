/**
 * @module variable-resolver
 * Template variable resolution for deployment files and rendered templates.
 * Supports {{env.XXX}}, {{config.xxx}}, {{timestamp}} and {{date}}.
 */

export interface VariableContext {
  /** Values for `{{config.xxx}}` */
  config: Record<string, string>;
  /** Values for `{{env.XXX}}`, usually `process.env` */
  env: Record<string, string | undefined>;
}

const PLACEHOLDER = /\{\{(.+?)\}\}/g;

/**
 * Replace `{{xxx}}` template variables in a string.
 *
 * - `{{timestamp}}` → `Date.now()`
 * - `{{date}}` → current date in `YYYY-MM-DD` format
 * - `{{env.XXX}}` → environment value
 * - `{{config.xxx}}` → config-level value
 *
 * Undefined variables are preserved as-is (`{{env.MISSING}}` stays put) so
 * validation can report them.
 */
export function resolveVariables(template: string, context: VariableContext): string {
  return template.replace(PLACEHOLDER, (_match, expr: string) => {
    const trimmed = expr.trim();

    if (trimmed === 'timestamp') {
      return String(Date.now());
    }
    if (trimmed === 'date') {
      return new Date().toISOString().slice(0, 10);
    }

    if (trimmed.startsWith('env.')) {
      const value = context.env[trimmed.slice(4)];
      return value !== undefined && value !== '' ? value : `{{${trimmed}}}`;
    }

    if (trimmed.startsWith('config.')) {
      const value = context.config[trimmed.slice(7)];
      return value !== undefined ? value : `{{${trimmed}}}`;
    }

    return `{{${trimmed}}}`;
  });
}

/**
 * Recursively resolve template variables in an object, array, or string.
 * Object keys are not resolved; non-string primitives pass through.
 */
export function resolveObjectVariables(obj: unknown, context: VariableContext): unknown {
  if (typeof obj === 'string') {
    return resolveVariables(obj, context);
  }

  if (Array.isArray(obj)) {
    return obj.map((item) => resolveObjectVariables(item, context));
  }

  if (obj !== null && typeof obj === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      result[key] = resolveObjectVariables(value, context);
    }
    return result;
  }

  return obj;
}

/** Placeholders left after resolution, e.g. `['env.SERVICE_HOST']`. */
export function findUnresolved(value: string): string[] {
  return [...value.matchAll(PLACEHOLDER)].map((m) => (m[1] ?? '').trim());
}

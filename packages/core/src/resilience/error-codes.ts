/**
 * @module resilience/error-codes
 * Structured error types, error code registry, and factory shared by every
 * lifecycle component.
 *
 * Component operations never throw for expected failures: they return an
 * {@link Outcome} whose failure branch carries a {@link StructuredError}.
 * {@link DeployError} is reserved for conditions that must abort the
 * enclosing phase (for example an unavailable entropy source).
 */

// =====================================================================
// Error Code Union & Enums
// =====================================================================

/** All known deployment error codes. */
export type ErrorCode =
  | 'CONFIGURATION_ERROR'
  | 'DEPENDENCY_UNREADY'
  | 'VALIDATION_FAILED'
  | 'EXTERNAL_TOOL_FAILURE'
  | 'VERIFICATION_FAILED'
  | 'ENTROPY_UNAVAILABLE'
  | 'DOCKER_UNAVAILABLE'
  | 'DISK_SPACE_LOW'
  | 'PORT_CONFLICT'
  | 'CONFIRMATION_MISMATCH';

/** Broad classification of error origin. */
export type ErrorCategory = 'configuration' | 'dependency' | 'security' | 'infrastructure';

/** Impact severity guiding how the orchestrator reacts. */
export type ErrorSeverity = 'fatal' | 'recoverable' | 'warning';

/** Machine-readable error object returned by lifecycle operations. */
export interface StructuredError {
  code: ErrorCode;
  category: ErrorCategory;
  severity: ErrorSeverity;
  message: string;
  details: Record<string, unknown>;
  suggestedActions: string[];
  timestamp: number;
}

/** Discriminated result of a lifecycle operation. */
export type Outcome<T = void> =
  | { ok: true; value: T; warnings: string[] }
  | { ok: false; error: StructuredError };

export function succeed<T>(value: T, warnings: string[] = []): Outcome<T> {
  return { ok: true, value, warnings };
}

export function fail<T = never>(
  code: ErrorCode,
  message: string,
  details: Record<string, unknown> = {},
): Outcome<T> {
  return { ok: false, error: createStructuredError(code, message, details) };
}

/** Wrap an existing StructuredError as a failed outcome. */
export function failWith<T = never>(error: StructuredError): Outcome<T> {
  return { ok: false, error };
}

// =====================================================================
// Error Metadata Registry
// =====================================================================

interface ErrorMetadataEntry {
  category: ErrorCategory;
  defaultSeverity: ErrorSeverity;
  suggestedActions: string[];
}

/** Default classification and remediation hints for every error code. */
export const ERROR_METADATA: ReadonlyMap<ErrorCode, ErrorMetadataEntry> = new Map<ErrorCode, ErrorMetadataEntry>([
  ['CONFIGURATION_ERROR', {
    category: 'configuration',
    defaultSeverity: 'fatal',
    suggestedActions: ['Fix the deployment file and re-run the command', 'Run `berth check` to validate the configuration'],
  }],
  ['DEPENDENCY_UNREADY', {
    category: 'dependency',
    defaultSeverity: 'fatal',
    suggestedActions: ['Inspect the service logs with `docker compose logs <service>`', 'Re-run the install from the failed phase with `berth install --from <n>`'],
  }],
  ['VALIDATION_FAILED', {
    category: 'security',
    defaultSeverity: 'fatal',
    suggestedActions: ['Correct the rejected value', 'Let berth generate a new secret by removing the weak entry'],
  }],
  ['EXTERNAL_TOOL_FAILURE', {
    category: 'infrastructure',
    defaultSeverity: 'fatal',
    suggestedActions: ['Read the captured stderr above', 'Re-run the failed operation once the tool succeeds manually'],
  }],
  ['VERIFICATION_FAILED', {
    category: 'security',
    defaultSeverity: 'fatal',
    suggestedActions: ['Check file permissions on every scoped env file', 'Re-run `berth secrets rotate-webhook`'],
  }],
  ['ENTROPY_UNAVAILABLE', {
    category: 'security',
    defaultSeverity: 'fatal',
    suggestedActions: ['Verify the host exposes a cryptographic random source', 'Re-run the credential phase'],
  }],
  ['DOCKER_UNAVAILABLE', {
    category: 'infrastructure',
    defaultSeverity: 'fatal',
    suggestedActions: ['Start Docker daemon', 'Check DOCKER_HOST environment variable', 'Install the docker compose plugin'],
  }],
  ['DISK_SPACE_LOW', {
    category: 'infrastructure',
    defaultSeverity: 'warning',
    suggestedActions: ['Run docker system prune', 'Free disk space before syncing the chain'],
  }],
  ['PORT_CONFLICT', {
    category: 'infrastructure',
    defaultSeverity: 'warning',
    suggestedActions: ['Stop the process holding the port', 'Change the published port in the compose file'],
  }],
  ['CONFIRMATION_MISMATCH', {
    category: 'security',
    defaultSeverity: 'recoverable',
    suggestedActions: ['Re-run the command and type the confirmation phrase exactly'],
  }],
]);

// =====================================================================
// Factory Function
// =====================================================================

/**
 * Create a complete StructuredError from an error code.
 *
 * Resolves category, severity and remediation from the registry, with an
 * optional severity override.
 */
export function createStructuredError(
  code: ErrorCode,
  message: string,
  details: Record<string, unknown> = {},
  severityOverride?: ErrorSeverity,
): StructuredError {
  const metadata = ERROR_METADATA.get(code);
  if (!metadata) {
    return {
      code,
      category: 'infrastructure',
      severity: severityOverride ?? 'fatal',
      message,
      details,
      suggestedActions: [],
      timestamp: Date.now(),
    };
  }

  return {
    code,
    category: metadata.category,
    severity: severityOverride ?? metadata.defaultSeverity,
    message,
    details,
    suggestedActions: [...metadata.suggestedActions],
    timestamp: Date.now(),
  };
}

// =====================================================================
// DeployError Class
// =====================================================================

/**
 * Error subclass wrapping a StructuredError for throw/catch patterns.
 *
 * Use `toJSON()` for serialization into reports and the operation log.
 */
export class DeployError extends Error {
  public readonly structuredError: StructuredError;

  constructor(
    code: ErrorCode,
    message: string,
    details: Record<string, unknown> = {},
    severityOverride?: ErrorSeverity,
  ) {
    super(message);
    this.name = 'DeployError';
    this.structuredError = createStructuredError(code, message, details, severityOverride);
  }

  /** Serialize the structured error payload for JSON transport. */
  toJSON(): StructuredError {
    return this.structuredError;
  }

  get code(): ErrorCode {
    return this.structuredError.code;
  }

  get severity(): ErrorSeverity {
    return this.structuredError.severity;
  }
}

/** Normalise anything caught into a StructuredError. */
export function toStructuredError(err: unknown, fallback: ErrorCode = 'EXTERNAL_TOOL_FAILURE'): StructuredError {
  if (err instanceof DeployError) return err.structuredError;
  const message = err instanceof Error ? err.message : String(err);
  return createStructuredError(fallback, message);
}

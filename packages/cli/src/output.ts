/**
 * @module output
 * Terminal rendering shared by every command: ANSI colours, status icons,
 * bus-event log lines and error reports.
 */

import type { Bus, BusMessage, StructuredError } from '@berth/core';

// ── ANSI colours ──────────────────────────────────────────────────────
export const GREEN = '\x1b[32m';
export const RED = '\x1b[31m';
export const YELLOW = '\x1b[33m';
export const GRAY = '\x1b[90m';
export const BOLD = '\x1b[1m';
export const RESET = '\x1b[0m';

export const OK = `${GREEN}✓${RESET}`;
export const FAIL = `${RED}✗${RESET}`;
export const WARN = `${YELLOW}⚠${RESET}`;
export const INFO = `${GRAY}•${RESET}`;

export function log(icon: string, msg: string): void {
  console.log(`  ${icon} ${msg}`);
}

export function heading(text: string): void {
  console.log(`\n${BOLD}${text}${RESET}\n`);
}

export function warnAll(warnings: readonly string[]): void {
  for (const warning of warnings) log(WARN, `${YELLOW}${warning}${RESET}`);
}

export function statusIcon(status: string): string {
  switch (status) {
    case 'pass':
    case 'ok':
    case 'up':
    case 'healthy':
    case 'valid':
    case 'synced':
      return OK;
    case 'fail':
    case 'failed':
    case 'down':
    case 'unhealthy':
    case 'expired':
    case 'unreachable':
      return FAIL;
    case 'skipped':
      return INFO;
    default:
      return WARN;
  }
}

/** Print a structured error with its remediation hints. */
export function printStructuredError(error: StructuredError): void {
  console.error(`\n${RED}${BOLD}${error.code}${RESET}${RED}: ${error.message}${RESET}`);
  for (const action of error.suggestedActions) {
    console.error(`  ${GRAY}→ ${action}${RESET}`);
  }
}

// ── Bus logging ───────────────────────────────────────────────────────

const CHANNELS = ['install', 'credentials', 'resources', 'health', 'certificates', 'chain', 'backups'] as const;

function field(data: unknown, key: string): string {
  if (data === null || typeof data !== 'object') return '';
  const value: unknown = Reflect.get(data, key);
  return value === undefined ? '' : String(value);
}

/** One line for the events worth showing without --verbose. */
function describeEvent(channel: string, msg: BusMessage): string | null {
  const { data } = msg;
  switch (`${channel}:${msg.event}`) {
    case 'install:phase_start':
      return `${BOLD}[${field(data, 'ordinal')}/13]${RESET} ${field(data, 'name')}`;
    case 'install:readiness_wait':
      return `${GRAY}waiting for ${field(data, 'service')}${RESET}`;
    case 'install:service_not_ready':
      return `${RED}${field(data, 'service')} did not become ready${RESET}`;
    case 'credentials:credential_replaced':
      return `${YELLOW}replaced weak ${field(data, 'key')} in ${field(data, 'location')}${RESET}`;
    case 'credentials:credential_rejected':
      return `${YELLOW}refused weak value for ${field(data, 'key')}${RESET}`;
    case 'resources:volume_removed':
      return `${GRAY}removed volume ${field(data, 'volume')}${RESET}`;
    case 'chain:node_env_seeded':
      return `${GRAY}seeded node env with ${field(data, 'keys')} keys${RESET}`;
    case 'backups:backup_failed':
      return `${RED}${field(data, 'kind')} backup failed${RESET}`;
    case 'certificates:certificate_obtain_start':
      return `${GRAY}requesting certificate for ${field(data, 'domain')}${RESET}`;
    default:
      return null;
  }
}

/**
 * Render bus events as log lines. Returns the unsubscribe function.
 * With `verbose`, every event is printed with its payload.
 */
export function attachLogger(bus: Bus, verbose: boolean): () => void {
  const unsubscribers = CHANNELS.map((channel) =>
    bus.subscribe(channel, (msg) => {
      if (verbose) {
        console.log(`  ${GRAY}[${channel}] ${msg.event} ${JSON.stringify(msg.data)}${RESET}`);
        return;
      }
      const line = describeEvent(channel, msg);
      if (line !== null) console.log(`  ${line}`);
    }),
  );
  return () => unsubscribers.forEach((unsubscribe) => unsubscribe());
}

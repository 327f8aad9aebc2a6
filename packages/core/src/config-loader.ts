/**
 * @module config-loader
 * Loads `berth.yaml`, validates it with Zod schemas and builds the immutable
 * {@link Deployment} every component receives.
 *
 * The `.env` beside the deployment file is parsed (not injected into
 * `process.env`) and used for `{{env.XXX}}` substitution together with the
 * process environment, which wins on conflicts.
 */

import { z } from 'zod';
import yaml from 'js-yaml';
import fs from 'node:fs/promises';
import path from 'node:path';
import dotenv from 'dotenv';
import { NETWORK_TARGETS, type Deployment, type DeploymentMode, type NetworkTarget } from './types.js';
import { findUnresolved, resolveObjectVariables } from './variable-resolver.js';
import { DeployError, fail, succeed, type Outcome } from './resilience/error-codes.js';

// =====================================================================
// Zod Sub-Schemas
// =====================================================================

const DURATION = /^\d+(ms|s|m|h)$/;

const DurationSchema = z.string().regex(DURATION, 'expected a duration such as "500ms", "2s" or "2m"');

/** One command run inside a service container during application setup */
export const AppStepSchema = z.object({
  name: z.string().describe('Label shown in progress output'),
  service: z.string().optional().describe('Compose service to exec into (defaults to application.service)'),
  command: z.array(z.string()).min(1).describe('argv executed inside the container'),
  required: z.boolean().default(true).describe('A failing required step fails the phase'),
  input: z.string().optional().describe('Text written to the command stdin'),
  skipIfKey: z.string().optional().describe('Skip when this key already exists in the dashboard env file'),
  timeout: DurationSchema.optional().describe('Step timeout (default 10m)'),
}).describe('Application setup step');

export const DEFAULT_SETUP_STEPS: z.input<typeof AppStepSchema>[] = [
  { name: 'Install Composer dependencies', command: ['composer', 'install'] },
  { name: 'Run database migrations', command: ['php', 'artisan', 'migrate', '--force'], required: false },
  { name: 'Seed database', command: ['php', 'artisan', 'db:seed', '--force'], required: false },
  { name: 'Install Passport', command: ['php', 'artisan', 'passport:install', '--force'] },
  { name: 'Generate encryption key', command: ['php', 'artisan', 'encrypt:generate'], input: 'yes\n', skipIfKey: 'ENCRYPTION_KEY' },
  { name: 'Install Node.js dependencies', command: ['npm', 'install', '--legacy-peer-deps'] },
  { name: 'Build frontend assets', command: ['npm', 'run', 'development'], required: false },
];

export const DEFAULT_OPTIONAL_STEPS: z.input<typeof AppStepSchema>[] = [
  { name: 'Install Horizon', command: ['php', 'artisan', 'horizon:install'], required: false },
  { name: 'Link Passport client environment', command: ['php', 'artisan', 'passportenv:link'], required: false },
  { name: 'Create address proof directory', command: ['mkdir', '-p', '/opt/veriscope/veriscope_addressproof'], required: false },
];

export const ProjectSchema = z.object({
  name: z.string().min(1).describe('Compose project name, prefix of every volume'),
  composeFile: z.string().default('docker-compose.yml').describe('Compose file relative to the project directory'),
  directory: z.string().default('.').describe('Project directory relative to the deployment file'),
}).describe('Compose project');

export const DeploymentSchema = z.object({
  serviceHost: z.string().describe('Public host name used for certificates (supports {{env.X}})'),
  commonName: z.string().describe('Organisation label written into the node identity'),
  networkTarget: z.string().describe(`Chain target: ${NETWORK_TARGETS.join(', ')}`),
  mode: z.enum(['development', 'production']).optional().describe('Overrides mode detection from the host name'),
}).describe('Target environment');

export const FilesSchema = z.object({
  root: z.string().default('.env').describe('Compose-level env file'),
  node: z.string().default('veriscope_ta_node/.env').describe('Node service env file'),
  dashboard: z.string().default('veriscope_ta_dashboard/.env').describe('Dashboard service env file'),
}).default({}).describe('Env files, relative to the project directory');

export const ReadinessSchema = z.object({
  interval: DurationSchema.default('2s').describe('Delay between probe attempts'),
  timeout: DurationSchema.default('60s').describe('Per-service readiness timeout'),
  allServicesTimeout: DurationSchema.default('120s').describe('Timeout for each service in an all-services wait'),
}).default({}).describe('Readiness gate timings');

export const HealthSchema = z.object({
  concurrency: z.number().int().min(1).default(4).describe('Probes dispatched in parallel'),
  probeTimeout: DurationSchema.default('10s').describe('A probe slower than this counts as Down'),
}).default({}).describe('Health monitor');

export const RpcSchema = z.object({
  url: z.string().url().default('http://localhost:8545').describe('Blockchain client JSON-RPC endpoint'),
  timeout: DurationSchema.default('5s').describe('Per-request timeout'),
}).default({}).describe('JSON-RPC client');

export const CertificatesSchema = z.object({
  obtainOnInstall: z.boolean().default(true).describe('Request a certificate during install when the host is eligible'),
  webroot: z.string().default('/var/www/certbot').describe('HTTP challenge webroot inside the proxy'),
  liveDir: z.string().default('/etc/letsencrypt/live').describe('Certificate authority live directory'),
  expiryThresholdDays: z.number().int().min(1).default(30).describe('Days before expiry that count as expiring soon'),
  templatesDir: z.string().default('templates').describe('Proxy config templates'),
  proxyConfigOutput: z.string().default('nginx/nginx.conf').describe('Rendered proxy config path'),
}).default({}).describe('Certificate lifecycle');

export const ChainSchema = z.object({
  directory: z.string().default('chains').describe('Per-network chain files'),
  statsSecret: z.string().default('').describe('Ethstats reporting secret'),
}).default({}).describe('Chain-specific configuration');

export const ApplicationSchema = z.object({
  service: z.string().default('app').describe('Application service for setup commands'),
  setup: z.array(AppStepSchema).default(DEFAULT_SETUP_STEPS).describe('Phase 11 steps'),
  optional: z.array(AppStepSchema).default(DEFAULT_OPTIONAL_STEPS).describe('Phase 12 steps'),
  adminCommand: z.array(z.string()).min(1).default(['php', 'artisan', 'createuser:admin']).describe('Interactive admin creation'),
}).default({}).describe('Application setup');

export const BackupsSchema = z.object({
  directory: z.string().default('backups').describe('Backup archives, relative to the project directory'),
  retentionDays: z.number().int().min(1).default(30).describe('Age after which `backup clean` offers to delete an archive'),
}).default({}).describe('Backup and restore');

export const LogSchema = z.object({
  file: z.string().default('logs/operations.json').describe('Operation log, relative to the project directory'),
}).default({}).describe('Operation log');

// =====================================================================
// Complete Configuration Schema
// =====================================================================

export const BerthConfigSchema = z.object({
  version: z.string().default('1').describe('Configuration schema version'),
  project: ProjectSchema,
  deployment: DeploymentSchema,
  files: FilesSchema,
  readiness: ReadinessSchema,
  health: HealthSchema,
  rpc: RpcSchema,
  certificates: CertificatesSchema,
  chain: ChainSchema,
  application: ApplicationSchema,
  backups: BackupsSchema,
  log: LogSchema,
}).describe('berth deployment configuration');

export type BerthConfig = z.infer<typeof BerthConfigSchema>;
export type AppStep = z.infer<typeof AppStepSchema>;

export interface LoadedConfig {
  config: BerthConfig;
  /** Absolute path of the deployment file */
  configPath: string;
  /** Absolute project directory */
  projectDir: string;
}

// =====================================================================
// Config Loader
// =====================================================================

/**
 * Load and validate a deployment file.
 *
 * Steps:
 * 1. Parse `.env` from the deployment file's directory
 * 2. Read and parse the YAML file
 * 3. Substitute `{{env.XXX}}` variables
 * 4. Validate with the Zod schema
 * 5. Blank optional settings that still hold a placeholder
 *
 * @throws {DeployError} CONFIGURATION_ERROR on a missing file, bad YAML or
 *   schema violations (all issues are listed)
 */
export async function loadConfig(
  configPath?: string,
  env: Record<string, string | undefined> = process.env,
): Promise<LoadedConfig> {
  const resolvedPath = await resolveConfigPath(configPath);
  const configDir = path.dirname(resolvedPath);

  const fileEnv = await readDotenv(path.resolve(configDir, '.env'));

  let rawContent: string;
  try {
    rawContent = await fs.readFile(resolvedPath, 'utf-8');
  } catch (err) {
    throw new DeployError('CONFIGURATION_ERROR', `Cannot read deployment file ${resolvedPath}: ${errorMessage(err)}`);
  }

  let parsed: unknown;
  try {
    parsed = yaml.load(rawContent);
  } catch (err) {
    throw new DeployError('CONFIGURATION_ERROR', `YAML syntax error in ${resolvedPath}: ${errorMessage(err)}`);
  }

  if (parsed === null || parsed === undefined || typeof parsed !== 'object') {
    throw new DeployError('CONFIGURATION_ERROR', `Deployment file is empty or not a mapping: ${resolvedPath}`);
  }

  const resolved = resolveObjectVariables(parsed, { config: {}, env: { ...fileEnv, ...env } });

  const result = BerthConfigSchema.safeParse(resolved);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new DeployError('CONFIGURATION_ERROR', `Configuration validation failed: ${issues}`, {
      file: resolvedPath,
    });
  }

  const config = result.data;
  // An optional setting whose variable is unset counts as absent.
  if (findUnresolved(config.chain.statsSecret).length > 0) {
    config.chain.statsSecret = '';
  }

  return {
    config,
    configPath: resolvedPath,
    projectDir: path.resolve(configDir, config.project.directory),
  };
}

// =====================================================================
// Deployment
// =====================================================================

const DEVELOPMENT_HOST = /^(localhost|127\.0\.0\.1|.*\.local|.*\.test)$/i;

export function isNetworkTarget(value: string): value is NetworkTarget {
  return NETWORK_TARGETS.some((target) => target === value);
}

/**
 * Development when the host is a local pattern or the compose file is a dev
 * variant; an explicit mode always wins.
 */
export function deriveMode(serviceHost: string, composeFile: string, explicit?: DeploymentMode): DeploymentMode {
  if (explicit) return explicit;
  if (DEVELOPMENT_HOST.test(serviceHost)) return 'development';
  if (path.basename(composeFile).includes('dev')) return 'development';
  return 'production';
}

/** Validate the deployment section into the immutable {@link Deployment}. */
export function buildDeployment(loaded: LoadedConfig): Outcome<Deployment> {
  const { deployment, project } = loaded.config;
  const problems: string[] = [];

  const serviceHost = deployment.serviceHost.trim();
  const commonName = deployment.commonName.trim();
  const networkTarget = deployment.networkTarget.trim();

  for (const [field, value] of [['serviceHost', serviceHost], ['commonName', commonName], ['networkTarget', networkTarget]] as const) {
    const unresolved = findUnresolved(value);
    if (unresolved.length > 0) {
      problems.push(`deployment.${field} references unset variable ${unresolved.join(', ')}`);
    } else if (value.length === 0) {
      problems.push(`deployment.${field} must not be empty`);
    }
  }

  if (problems.length === 0 && !isNetworkTarget(networkTarget)) {
    problems.push(`deployment.networkTarget "${networkTarget}" is unknown (expected one of ${NETWORK_TARGETS.join(', ')})`);
  }

  if (problems.length > 0 || !isNetworkTarget(networkTarget)) {
    return fail('CONFIGURATION_ERROR', problems.join('; '), { file: loaded.configPath });
  }

  return succeed(Object.freeze({
    serviceHost,
    commonName,
    networkTarget,
    mode: deriveMode(serviceHost, project.composeFile, deployment.mode),
    projectName: project.name,
    composeFile: project.composeFile,
    projectDir: loaded.projectDir,
  }));
}

// =====================================================================
// Duration parsing
// =====================================================================

/**
 * Parse a duration string into milliseconds.
 *
 * @example parseDuration('2s') // 2000
 */
export function parseDuration(value: string): number {
  const match = value.match(/^(\d+)(ms|s|m|h)$/);
  if (!match?.[1] || !match[2]) {
    throw new DeployError('CONFIGURATION_ERROR', `Invalid duration "${value}"`);
  }
  const amount = Number.parseInt(match[1], 10);
  switch (match[2]) {
    case 'ms': return amount;
    case 's': return amount * 1000;
    case 'm': return amount * 60_000;
    default: return amount * 3_600_000;
  }
}

// =====================================================================
// Internal Helpers
// =====================================================================

/** Explicit path, else `berth.yaml` then `berth.yml` in cwd. */
async function resolveConfigPath(configPath?: string): Promise<string> {
  if (configPath) {
    return path.resolve(configPath);
  }

  const cwd = process.cwd();
  const candidates = [path.resolve(cwd, 'berth.yaml'), path.resolve(cwd, 'berth.yml')];
  for (const candidate of candidates) {
    if (await fileExists(candidate)) return candidate;
  }

  throw new DeployError(
    'CONFIGURATION_ERROR',
    `Deployment file not found. Looked for: ${candidates.join(', ')}`,
  );
}

async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

async function readDotenv(filePath: string): Promise<Record<string, string>> {
  if (!(await fileExists(filePath))) return {};
  return dotenv.parse(await fs.readFile(filePath, 'utf-8'));
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

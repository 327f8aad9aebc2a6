/**
 * @module context
 * Opens a Deployer for a command and maps the outcome to the exit code.
 */

import * as readline from 'node:readline/promises';
import { stdin as input, stdout as output } from 'node:process';
import type { Command } from 'commander';
import type { Deployer } from '@berth/core';
import { attachLogger, printStructuredError } from './output.js';

export type DeployerFactory = (configPath: string | undefined) => Promise<Deployer>;

export type Prompt = (message: string) => Promise<string>;

export interface ProgramOptions {
  /** Replaces config loading (tests) */
  openDeployer?: DeployerFactory;
  /** Replaces the terminal prompt (tests) */
  prompt?: Prompt;
}

export const openFromConfig: DeployerFactory = async (configPath) => {
  // Lazy import to avoid loading core for --help/--version
  const { Deployer } = await import('@berth/core');
  return Deployer.fromConfig(configPath);
};

export const askTerminal: Prompt = async (message) => {
  const rl = readline.createInterface({ input, output });
  try {
    return await rl.question(message);
  } finally {
    rl.close();
  }
};

export async function reportError(err: unknown): Promise<void> {
  const { toStructuredError } = await import('@berth/core');
  printStructuredError(toStructuredError(err));
}

/**
 * Run `action` against a freshly opened Deployer. A `false` result or a
 * thrown error sets exit code 1; the deployer is always closed.
 */
export async function withDeployer(
  program: Command,
  options: ProgramOptions,
  action: (deployer: Deployer) => Promise<boolean>,
): Promise<void> {
  const { config, verbose } = program.opts<{ config?: string; verbose?: boolean }>();
  const open = options.openDeployer ?? openFromConfig;

  let deployer: Deployer;
  try {
    deployer = await open(config);
  } catch (err) {
    await reportError(err);
    process.exitCode = 1;
    return;
  }

  const detach = attachLogger(deployer.bus, verbose ?? false);
  try {
    const ok = await action(deployer);
    if (!ok) process.exitCode = 1;
  } catch (err) {
    await reportError(err);
    process.exitCode = 1;
  } finally {
    detach();
    await deployer.close();
  }
}

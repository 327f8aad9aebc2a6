/**
 * @module certificates/proxy-config
 * Render the reverse-proxy configuration from its templates.
 */

import fs from 'node:fs/promises';
import path from 'node:path';
import type { CertificateRecord } from '../types.js';
import { findUnresolved, resolveVariables } from '../variable-resolver.js';
import { fail, succeed, type Outcome } from '../resilience/error-codes.js';

export const PLAIN_TEMPLATE = 'nginx.conf';
export const SSL_TEMPLATE = 'nginx-ssl.conf';

export interface ProxyConfigRequest {
  templatesDir: string;
  outputPath: string;
  serviceHost: string;
  /** TLS is enabled only when a certificate exists */
  certificate: Pick<CertificateRecord, 'certPath' | 'keyPath'> | null;
}

export interface ProxyConfigResult {
  template: string;
  outputPath: string;
  tls: boolean;
}

export async function renderProxyConfig(request: ProxyConfigRequest): Promise<Outcome<ProxyConfigResult>> {
  const tls = request.certificate !== null;
  const templateName = tls ? SSL_TEMPLATE : PLAIN_TEMPLATE;
  const templatePath = path.join(request.templatesDir, templateName);

  let template: string;
  try {
    template = await fs.readFile(templatePath, 'utf-8');
  } catch (err) {
    return fail('CONFIGURATION_ERROR', `Cannot read proxy template ${templatePath}: ${err instanceof Error ? err.message : String(err)}`);
  }

  const rendered = resolveVariables(template, {
    config: {
      serviceHost: request.serviceHost,
      certPath: request.certificate?.certPath ?? '',
      keyPath: request.certificate?.keyPath ?? '',
    },
    env: {},
  });

  const unresolved = findUnresolved(rendered);
  if (unresolved.length > 0) {
    return fail('CONFIGURATION_ERROR', `Proxy template ${templateName} has unknown placeholders: ${unresolved.join(', ')}`);
  }

  try {
    await fs.mkdir(path.dirname(request.outputPath), { recursive: true });
    await fs.writeFile(request.outputPath, rendered, 'utf-8');
  } catch (err) {
    return fail('EXTERNAL_TOOL_FAILURE', `Cannot write ${request.outputPath}: ${err instanceof Error ? err.message : String(err)}`);
  }

  return succeed({ template: templateName, outputPath: request.outputPath, tls });
}

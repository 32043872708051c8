import fs from 'fs/promises';
import { checkStructure } from '../certs/asset.js';
import type { OriginalAssetSource } from '../certs/original-source.js';
import { interceptionCertPath, type Settings } from '../config/loader.js';
import { findOnPath, type ToolRunner } from '../shared/exec.js';
import {
  InterceptionCertificateMissingError,
  MalformedCertificateError,
  PinswapError,
  PinswapErrorCode,
  ToolInvocationError,
} from '../shared/errors.js';
import type { SessionConfig } from './config.js';

export interface PreflightCheck {
  name: string;
  ok: boolean;
  detail: string;
  // Raised by assertPreflight when this check fails.
  error?: Error;
}

export interface PreflightDeps {
  runner: ToolRunner;
  originals: OriginalAssetSource;
}

export function requiredTools(config: Pick<SessionConfig, 'uiMode' | 'skipNetworkProxyConfig'>, settings: Settings): string[] {
  const tools = [
    settings.tools.openssl,
    settings.tools.git,
    config.uiMode === 'web' ? settings.proxy.webCommand : settings.proxy.headlessCommand,
  ];
  if (!config.skipNetworkProxyConfig) tools.push(settings.network.helper);
  return tools;
}

async function checkTool(runner: ToolRunner, tool: string): Promise<PreflightCheck> {
  const found = await findOnPath(runner, tool);
  if (found) return { name: `tool ${tool}`, ok: true, detail: found };
  return {
    name: `tool ${tool}`,
    ok: false,
    detail: 'not found on PATH',
    error: new ToolInvocationError(`${tool} not found on PATH`, { command: tool, args: [], exitCode: null }),
  };
}

async function checkPinnedStructure(config: SessionConfig): Promise<PreflightCheck> {
  const content = await fs.readFile(config.pinnedCertPath);
  const problem = checkStructure(content, 'DER');
  if (!problem) return { name: 'pinned certificate', ok: true, detail: config.pinnedCertPath };
  return {
    name: 'pinned certificate',
    ok: false,
    detail: problem,
    error: new MalformedCertificateError(config.pinnedCertPath, problem),
  };
}

async function checkPinnedTracking(config: SessionConfig, originals: OriginalAssetSource): Promise<PreflightCheck> {
  const status = await originals.describe(config.pinnedCertPath);
  if (!status.tracked) {
    return {
      name: 'pinned certificate tracking',
      ok: false,
      detail: 'not tracked by version control; it could not be restored after the session',
      error: new PinswapError(
        PinswapErrorCode.PINNED_CERT_DIRTY,
        `${config.pinnedCertPath} is not under version control, so it cannot be restored after the session`
      ),
    };
  }
  if (status.modified) {
    return {
      name: 'pinned certificate tracking',
      ok: false,
      detail: 'has uncommitted changes that restoring would discard',
      error: new PinswapError(
        PinswapErrorCode.PINNED_CERT_DIRTY,
        `${config.pinnedCertPath} has uncommitted changes; commit or discard them before starting a session`
      ),
    };
  }
  return { name: 'pinned certificate tracking', ok: true, detail: 'tracked, no local changes' };
}

async function checkInterceptionCertificate(settings: Settings): Promise<PreflightCheck> {
  const certPath = interceptionCertPath(settings);
  try {
    await fs.access(certPath);
    return { name: 'interception certificate', ok: true, detail: certPath };
  } catch {
    return {
      name: 'interception certificate',
      ok: false,
      detail: `missing at ${certPath} (run the proxy once to generate it)`,
      error: new InterceptionCertificateMissingError(certPath),
    };
  }
}

/**
 * Everything a session needs before it changes anything. The tool checks run
 * first: the tracking check itself needs git.
 */
export async function preflight(config: SessionConfig, settings: Settings, deps: PreflightDeps): Promise<PreflightCheck[]> {
  const checks: PreflightCheck[] = [];
  for (const tool of requiredTools(config, settings)) {
    checks.push(await checkTool(deps.runner, tool));
  }

  checks.push(await checkPinnedStructure(config));
  const gitAvailable = checks.find(c => c.name === `tool ${settings.tools.git}`)?.ok ?? false;
  if (gitAvailable) {
    checks.push(await checkPinnedTracking(config, deps.originals));
  } else {
    checks.push({ name: 'pinned certificate tracking', ok: false, detail: `skipped: ${settings.tools.git} unavailable` });
  }

  checks.push(await checkInterceptionCertificate(settings));
  return checks;
}

export function assertPreflight(checks: readonly PreflightCheck[]): void {
  const failed = checks.find(c => !c.ok);
  if (!failed) return;
  throw failed.error ?? new PinswapError(PinswapErrorCode.INVALID_CONFIG, `${failed.name}: ${failed.detail}`);
}

export function formatPreflight(checks: readonly PreflightCheck[]): string[] {
  return checks.map(c => `${c.ok ? '✓' : '✗'} ${c.name}: ${c.detail}`);
}

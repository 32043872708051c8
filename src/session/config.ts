import fs from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import { PinswapError, PinswapErrorCode } from '../shared/errors.js';
import type { ProxyUiMode } from '../proxy/launcher.js';

export const SessionInputSchema = z.object({
  appRoot: z.string().min(1, 'app root path is required'),
  scriptPaths: z.array(z.string().min(1)).default([]),
  webUi: z.boolean().default(false),
  skipNetworkProxyConfig: z.boolean().default(false),
  // Overrides settings.app.pinnedCertificate; relative to appRoot.
  pinnedCertificate: z.string().min(1).optional(),
});

export type SessionInput = z.input<typeof SessionInputSchema>;

export interface SessionConfig {
  readonly appRoot: string;
  readonly pinnedCertPath: string;
  readonly scriptPaths: readonly string[];
  readonly uiMode: ProxyUiMode;
  readonly skipNetworkProxyConfig: boolean;
}

/**
 * Validate user input once, before a session starts. The pinned certificate
 * must be a readable file beneath the app root.
 */
export async function buildSessionConfig(
  input: SessionInput,
  defaults: { pinnedCertificate: string }
): Promise<SessionConfig> {
  const parsed = SessionInputSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`);
    throw new PinswapError(PinswapErrorCode.INVALID_CONFIG, `Invalid session options: ${issues.join('; ')}`, { issues });
  }

  const appRoot = path.resolve(parsed.data.appRoot);
  const relative = parsed.data.pinnedCertificate ?? defaults.pinnedCertificate;
  const pinnedCertPath = path.resolve(appRoot, relative);

  const fromRoot = path.relative(appRoot, pinnedCertPath);
  if (fromRoot === '' || fromRoot.startsWith('..') || path.isAbsolute(fromRoot)) {
    throw new PinswapError(
      PinswapErrorCode.INVALID_CONFIG,
      `Pinned certificate path must be inside the app root: ${relative}`,
      { appRoot, pinnedCertPath }
    );
  }

  try {
    const stat = await fs.stat(pinnedCertPath);
    if (!stat.isFile()) throw new Error('not a regular file');
    await fs.access(pinnedCertPath, fs.constants.R_OK);
  } catch (err) {
    throw new PinswapError(
      PinswapErrorCode.PINNED_CERT_NOT_FOUND,
      `No readable pinned certificate at ${pinnedCertPath}. Check --app-root or the pinned certificate path.`,
      { appRoot, pinnedCertPath, cause: err instanceof Error ? err.message : String(err) }
    );
  }

  const config: SessionConfig = {
    appRoot,
    pinnedCertPath,
    scriptPaths: Object.freeze([...parsed.data.scriptPaths]),
    uiMode: parsed.data.webUi ? 'web' : 'headless',
    skipNetworkProxyConfig: parsed.data.skipNetworkProxyConfig,
  };
  return Object.freeze(config);
}

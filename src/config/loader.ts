// Settings loader: defaults <- YAML file <- environment, validated with zod.
// The default file (~/.config/pinswap/config.yaml) is optional and never written;
// a session only ever touches the pinned certificate and its own temp directory.
// Add new keys to SettingsSchema with a .default() so an empty file stays valid.
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { PinswapError, PinswapErrorCode } from '../shared/errors.js';
import { logger } from '../shared/logger.js';

export const DEFAULT_CONFIG_PATH = path.join(os.homedir(), '.config', 'pinswap', 'config.yaml');

// File name the interception proxy gives its CA certificate inside its conf dir.
export const INTERCEPTION_CA_FILE = 'mitmproxy-ca-cert.pem';

export const SettingsSchema = z
  .object({
    proxy: z
      .object({
        listenHost: z.string().min(1).default('127.0.0.1'),
        listenPort: z.number().int().min(1).max(65535).default(8080),
        confDir: z.string().min(1).default('~/.mitmproxy'),
        headlessCommand: z.string().min(1).default('mitmproxy'),
        webCommand: z.string().min(1).default('mitmweb'),
      })
      .strict()
      .default({}),
    tools: z
      .object({
        openssl: z.string().min(1).default('openssl'),
        git: z.string().min(1).default('git'),
      })
      .strict()
      .default({}),
    network: z
      .object({
        helper: z.string().min(1).default('manage_proxy'),
      })
      .strict()
      .default({}),
    app: z
      .object({
        pinnedCertificate: z.string().min(1).default('SignalServiceKit/Resources/Certificates/signal-messenger.cer'),
      })
      .strict()
      .default({}),
  })
  .strict();

export type Settings = z.infer<typeof SettingsSchema>;

export interface SettingsResult {
  settings: Settings;
  configPath: string;
  fromFile: boolean;
}

export function expandHome(p: string): string {
  if (p === '~') return os.homedir();
  if (p.startsWith('~/')) return path.join(os.homedir(), p.slice(2));
  return p;
}

export function interceptionCertPath(settings: Settings): string {
  return path.join(expandHome(settings.proxy.confDir), INTERCEPTION_CA_FILE);
}

function envOverrides(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const overrides: Record<string, Record<string, unknown>> = {};
  if (env['PINSWAP_PROXY_PORT']) {
    overrides['proxy'] = { listenPort: Number(env['PINSWAP_PROXY_PORT']) };
  }
  if (env['PINSWAP_NETWORK_HELPER']) {
    overrides['network'] = { helper: env['PINSWAP_NETWORK_HELPER'] };
  }
  return overrides;
}

/** Deep merge b into a (a provides defaults, b overrides). */
function deepMerge(a: Record<string, unknown>, b: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = { ...a };
  for (const key of Object.keys(b)) {
    const aVal = a[key];
    const bVal = b[key];
    if (isPlainObject(aVal) && isPlainObject(bVal)) {
      result[key] = deepMerge(aVal, bVal);
    } else if (bVal !== undefined) {
      result[key] = bVal;
    }
  }
  return result;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

async function readConfigFile(configPath: string, explicit: boolean): Promise<Record<string, unknown> | null> {
  let raw: string;
  try {
    raw = await fs.readFile(configPath, 'utf-8');
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === 'ENOENT' && !explicit) return null;
    throw new PinswapError(PinswapErrorCode.INVALID_CONFIG, `Cannot read config file: ${configPath}`, {
      cause: err instanceof Error ? err.message : String(err),
    });
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(raw);
  } catch (err) {
    throw new PinswapError(PinswapErrorCode.INVALID_CONFIG, `Config file is not valid YAML: ${configPath}`, {
      cause: err instanceof Error ? err.message : String(err),
    });
  }
  if (parsed === null || parsed === undefined) return {};
  if (!isPlainObject(parsed)) {
    throw new PinswapError(PinswapErrorCode.INVALID_CONFIG, `Config file must contain a mapping: ${configPath}`);
  }
  return parsed;
}

export async function loadSettings(
  options: { configPath?: string; env?: NodeJS.ProcessEnv } = {}
): Promise<SettingsResult> {
  const env = options.env ?? process.env;
  const explicitPath = options.configPath ?? env['PINSWAP_CONFIG'];
  const configPath = explicitPath ? expandHome(explicitPath) : DEFAULT_CONFIG_PATH;

  const fileConfig = await readConfigFile(configPath, Boolean(explicitPath));
  const merged = deepMerge(fileConfig ?? {}, envOverrides(env));

  const parsed = SettingsSchema.safeParse(merged);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`);
    throw new PinswapError(PinswapErrorCode.INVALID_CONFIG, `Invalid settings: ${issues.join('; ')}`, {
      configPath,
      issues,
    });
  }

  logger.debug({ configPath, fromFile: fileConfig !== null }, 'Settings loaded');
  return { settings: parsed.data, configPath, fromFile: fileConfig !== null };
}

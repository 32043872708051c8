import type { ToolRunner } from '../shared/exec.js';
import { logger } from '../shared/logger.js';

export type ProxyUiMode = 'headless' | 'web';

export interface ExitStatus {
  exitCode: number | null;
  signal: string | null;
  // Ended by the operator (signal, or the shell's 128+SIGINT/SIGTERM codes).
  userTerminated: boolean;
}

export interface ProxyLaunchSettings {
  headlessCommand: string;
  webCommand: string;
  listenHost: string;
  listenPort: number;
}

const INTERRUPT_EXIT_CODES = new Set([130, 143]);

export function buildProxyArgs(
  scriptPaths: readonly string[],
  upstreamTrustCertPath: string,
  settings: Pick<ProxyLaunchSettings, 'listenHost' | 'listenPort'>
): string[] {
  const args = ['--listen-host', settings.listenHost, '--listen-port', String(settings.listenPort)];
  for (const scriptPath of scriptPaths) {
    args.push('--scripts', scriptPath);
  }
  // Upstream servers still present the app's real chain; the proxy's outbound leg must trust it.
  args.push('--set', `ssl_verify_upstream_trusted_ca=${upstreamTrustCertPath}`);
  return args;
}

export class ProxyProcessLauncher {
  constructor(
    private readonly runner: ToolRunner,
    private readonly settings: ProxyLaunchSettings
  ) {}

  commandFor(mode: ProxyUiMode): string {
    return mode === 'web' ? this.settings.webCommand : this.settings.headlessCommand;
  }

  /**
   * Blocks until the proxy exits. Rejects only when it cannot be started; every
   * exit is returned as an ExitStatus and the session decides whether it failed.
   */
  async run(mode: ProxyUiMode, scriptPaths: readonly string[], upstreamTrustCertPath: string): Promise<ExitStatus> {
    const command = this.commandFor(mode);
    const args = buildProxyArgs(scriptPaths, upstreamTrustCertPath, this.settings);
    logger.info({ command, scripts: scriptPaths.length, listenPort: this.settings.listenPort }, 'Starting interception proxy');

    const result = await this.runner.run({ command, args, interactive: true });

    const signal = result.signal ?? null;
    const status: ExitStatus = {
      exitCode: result.exitCode,
      signal,
      userTerminated: signal !== null || (result.exitCode !== null && INTERRUPT_EXIT_CODES.has(result.exitCode)),
    };
    if (status.exitCode !== 0 && !status.userTerminated) {
      logger.warn({ command, exitCode: status.exitCode }, 'Interception proxy exited non-zero');
    } else {
      logger.info({ command, ...status }, 'Interception proxy exited');
    }
    return status;
  }
}

import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { loadCertificateAsset } from '../certs/asset.js';
import type { CertificateCodec } from '../certs/codec.js';
import type { CertificateSubstitutor } from '../certs/substitutor.js';
import type { NetworkProxyConfigurator } from '../network/proxy-config.js';
import type { ExitStatus, ProxyProcessLauncher } from '../proxy/launcher.js';
import { SessionCancelledError, toError, type PhaseError, type SessionPhase } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import type { SessionConfig } from './config.js';

export type SessionStage = 'Idle' | 'CertConverted' | 'CertSubstituted' | 'ProxyEnabled' | 'Running' | 'TornDown';

// What teardown has to undo. Flags are set from what actually happened, not from the plan.
export interface SessionState {
  certificateSubstituted: boolean;
  networkProxyEnabled: boolean;
}

export interface SessionReport {
  readonly pinnedCertPath: string;
  readonly transitions: readonly SessionStage[];
  readonly finalState: SessionStage;
  readonly primaryError: PhaseError | null;
  readonly teardownErrors: readonly PhaseError[];
  readonly exitStatus: ExitStatus | null;
  readonly networkProxy: { host: string; port: number } | null;
}

export interface SessionDependencies {
  codec: Pick<CertificateCodec, 'convert'>;
  substitutor: Pick<CertificateSubstitutor, 'substitute' | 'restore'>;
  networkProxy: NetworkProxyConfigurator;
  launcher: Pick<ProxyProcessLauncher, 'run'>;
}

type SignalListener = (signal: NodeJS.Signals) => void;

// The part of `process` the orchestrator listens on.
export interface SignalSource {
  on(signal: NodeJS.Signals, listener: SignalListener): unknown;
  off(signal: NodeJS.Signals, listener: SignalListener): unknown;
}

export interface OrchestratorOptions {
  interceptionCertPath: string;
  proxyHost: string;
  proxyPort: number;
  // Parent of the per-session temp directory. Defaults to os.tmpdir().
  tempRoot?: string;
  // Defaults to process.
  signals?: SignalSource;
}

const HELD_SIGNALS: readonly NodeJS.Signals[] = ['SIGINT', 'SIGTERM', 'SIGHUP'];

const UPSTREAM_TRUST_FILE = 'upstream-ca.pem';

/**
 * Runs one interception session:
 *   Idle → CertConverted → CertSubstituted → ProxyEnabled → Running → TornDown
 *
 * Every state-changing step has an undo that runs on every exit path, driven by
 * SessionState. Teardown failures are collected next to the primary error, and
 * each undo is attempted exactly once.
 *
 * SIGINT, SIGTERM and SIGHUP are held for the whole run. Outside the proxy run a
 * signal cancels the session at the next step boundary; during teardown it is
 * logged and teardown carries on. Two sessions against the same app root or
 * host network settings must not overlap; callers serialize them.
 */
export class SessionOrchestrator {
  constructor(
    private readonly deps: SessionDependencies,
    private readonly options: OrchestratorOptions
  ) {}

  async run(config: SessionConfig): Promise<SessionReport> {
    const state: SessionState = { certificateSubstituted: false, networkProxyEnabled: false };
    const transitions: SessionStage[] = ['Idle'];
    const advance = (next: SessionStage): void => {
      transitions.push(next);
      logger.debug({ stage: next }, 'Session stage');
    };

    let phase: SessionPhase = 'convert';
    let primaryError: PhaseError | null = null;
    let exitStatus: ExitStatus | null = null;
    let tempDir: string | null = null;
    let tearingDown = false;
    let cancelledBy: NodeJS.Signals | null = null;
    const teardownErrors: PhaseError[] = [];

    const onSignal = (signal: NodeJS.Signals): void => {
      if (tearingDown) {
        logger.warn({ signal }, 'Signal received during teardown, finishing teardown first');
      } else if (phase === 'run-proxy') {
        // The runner forwards it to the proxy; its exit ends the run.
        logger.debug({ signal }, 'Signal received while the proxy runs');
      } else if (!cancelledBy) {
        cancelledBy = signal;
        logger.warn({ signal, phase }, 'Signal received, cancelling session after the current step');
      }
    };
    const throwIfCancelled = (): void => {
      if (cancelledBy) throw new SessionCancelledError(cancelledBy);
    };
    const release = holdSignals(this.options.signals ?? process, onSignal);

    try {
      // The portable copy must be taken before substitution overwrites the pinned asset.
      tempDir = await fs.mkdtemp(path.join(this.options.tempRoot ?? os.tmpdir(), 'pinswap-'));
      const pinned = await loadCertificateAsset(config.pinnedCertPath, 'DER');
      const upstreamTrust = await this.deps.codec.convert(pinned, 'PEM', path.join(tempDir, UPSTREAM_TRUST_FILE));
      advance('CertConverted');

      phase = 'substitute';
      throwIfCancelled();
      // Set before the attempt: a failed conversion may still have touched the asset.
      state.certificateSubstituted = true;
      await this.deps.substitutor.substitute(config.pinnedCertPath, this.options.interceptionCertPath);
      advance('CertSubstituted');

      phase = 'enable-network-proxy';
      throwIfCancelled();
      if (!config.skipNetworkProxyConfig) {
        await this.deps.networkProxy.enable(this.options.proxyHost, this.options.proxyPort);
        state.networkProxyEnabled = true;
      }
      advance('ProxyEnabled');

      phase = 'run-proxy';
      throwIfCancelled();
      advance('Running');
      exitStatus = await this.deps.launcher.run(config.uiMode, config.scriptPaths, upstreamTrust.path);
    } catch (err) {
      primaryError = { phase, error: toError(err) };
      logger.error({ phase, err: primaryError.error }, 'Session step failed, tearing down');
    } finally {
      tearingDown = true;
      teardownErrors.push(...(await this.tearDown(config, state)));
      if (tempDir) await removeTempDir(tempDir);
      advance('TornDown');
      release();
    }

    return {
      pinnedCertPath: config.pinnedCertPath,
      transitions,
      finalState: transitions[transitions.length - 1],
      primaryError,
      teardownErrors,
      exitStatus,
      networkProxy: config.skipNetworkProxyConfig
        ? null
        : { host: this.options.proxyHost, port: this.options.proxyPort },
    };
  }

  private async tearDown(config: SessionConfig, state: SessionState): Promise<PhaseError[]> {
    const errors: PhaseError[] = [];

    if (state.networkProxyEnabled) {
      try {
        await this.deps.networkProxy.disable();
        state.networkProxyEnabled = false;
      } catch (err) {
        errors.push({ phase: 'disable-network-proxy', error: toError(err) });
        logger.error({ err }, 'Failed to disable system network proxy');
      }
    }

    if (state.certificateSubstituted) {
      try {
        await this.deps.substitutor.restore(config.pinnedCertPath);
        state.certificateSubstituted = false;
      } catch (err) {
        errors.push({ phase: 'restore-certificate', error: toError(err) });
        logger.error({ err, pinnedCertPath: config.pinnedCertPath }, 'Failed to restore pinned certificate');
      }
    }

    return errors;
  }
}

function holdSignals(source: SignalSource, listener: SignalListener): () => void {
  for (const signal of HELD_SIGNALS) source.on(signal, listener);
  return () => {
    for (const signal of HELD_SIGNALS) source.off(signal, listener);
  };
}

// Holds only the session's portable copy; a leftover does not affect trust state.
async function removeTempDir(dir: string): Promise<void> {
  try {
    await fs.rm(dir, { recursive: true, force: true });
  } catch (err) {
    logger.warn({ dir, err }, 'Could not remove session temp directory');
  }
}

// The proxy stopped with a failure the operator did not cause (bad flags, port in use).
export function proxyFailed(status: ExitStatus | null): boolean {
  return status !== null && status.exitCode !== 0 && !status.userTerminated;
}

/** 0 = clean, 1 = the session itself failed, 2 = it ran but teardown left state behind. */
export function exitCodeFor(report: SessionReport): number {
  if (report.primaryError || proxyFailed(report.exitStatus)) return 1;
  if (report.teardownErrors.length > 0) return 2;
  return 0;
}

const PHASE_LABELS: Record<SessionPhase, string> = {
  convert: 'converting the pinned certificate',
  substitute: 'substituting the pinned certificate',
  'enable-network-proxy': 'enabling the system network proxy',
  'run-proxy': 'starting the interception proxy',
  'disable-network-proxy': 'disabling the system network proxy',
  'restore-certificate': 'restoring the pinned certificate',
};

export function formatSessionReport(
  report: SessionReport,
  hints: { git: string; networkHelper: string }
): string[] {
  const lines: string[] = [];

  if (report.primaryError) {
    const { phase, error } = report.primaryError;
    lines.push(`✗ Failed while ${PHASE_LABELS[phase]} [${phase}]: ${error.message}`);
  } else if (report.exitStatus) {
    const how = report.exitStatus.signal
      ? `signal ${report.exitStatus.signal}`
      : `exit ${report.exitStatus.exitCode ?? '?'}`;
    lines.push(
      proxyFailed(report.exitStatus)
        ? `✗ Interception proxy stopped on its own (${how}) [run-proxy]; see its output above.`
        : `✓ Proxy session ended (${how}).`
    );
  }

  for (const { phase, error } of report.teardownErrors) {
    lines.push(`✗ Teardown failed while ${PHASE_LABELS[phase]} [${phase}]: ${error.message}`);
    if (phase === 'restore-certificate') {
      lines.push(
        `  WARNING: ${report.pinnedCertPath} may still hold the interception certificate.`,
        `  Restore it manually: ${hints.git} checkout -- ${report.pinnedCertPath}`
      );
    } else if (phase === 'disable-network-proxy') {
      const target = report.networkProxy ? `${report.networkProxy.host}:${report.networkProxy.port}` : 'the proxy';
      lines.push(
        `  WARNING: the system network proxy may still point at ${target}.`,
        `  Disable it manually: ${hints.networkHelper} disable`
      );
    }
  }

  if (report.teardownErrors.length === 0) {
    lines.push('✓ Teardown complete; pinned certificate and network settings are back in their original state.');
  }
  return lines;
}

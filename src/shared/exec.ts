import execa from 'execa';
import { ToolInvocationError } from './errors.js';
import { logger } from './logger.js';

export interface ToolInvocation {
  readonly command: string;
  readonly args: readonly string[];
  readonly cwd?: string;
  // Keep stdout as text on the result. Ignored when interactive.
  readonly captureStdout?: boolean;
  // Hand the terminal to the program and block until it exits.
  readonly interactive?: boolean;
}

export interface ToolResult {
  stdout: string;
  stderr: string;
  // null when the program was ended by a signal.
  exitCode: number | null;
  signal?: string;
}

/**
 * Boundary between session code and the OS. run() resolves for every exit code
 * and rejects with ToolInvocationError only when the program cannot be started.
 */
export interface ToolRunner {
  run(invocation: ToolInvocation): Promise<ToolResult>;
}

export class ExecaToolRunner implements ToolRunner {
  async run(invocation: ToolInvocation): Promise<ToolResult> {
    const { command, args } = invocation;
    logger.debug({ command, args, cwd: invocation.cwd }, 'Running external tool');

    let child: execa.ExecaChildProcess;
    try {
      child = execa(command, [...args], {
        cwd: invocation.cwd,
        reject: false,
        stdio: invocation.interactive ? 'inherit' : 'pipe',
      });
    } catch (err) {
      throw new ToolInvocationError(`Failed to spawn ${command}: ${err instanceof Error ? err.message : String(err)}`, {
        command,
        args,
        exitCode: null,
      });
    }

    const release = invocation.interactive ? forwardSignals(child) : undefined;
    let result: execa.ExecaReturnValue;
    try {
      result = await child;
    } finally {
      release?.();
    }

    // execa reports spawn errors (ENOENT, EACCES) as a failed result with neither exit code nor signal.
    if (typeof result.exitCode !== 'number' && !result.signal) {
      const reason = result instanceof Error ? result.message : 'could not be started';
      throw new ToolInvocationError(`${command} could not be started: ${reason}`, {
        command,
        args,
        exitCode: null,
        stderr: result.stderr ?? '',
      });
    }

    return {
      stdout: invocation.captureStdout || !invocation.interactive ? result.stdout ?? '' : '',
      stderr: result.stderr ?? '',
      exitCode: typeof result.exitCode === 'number' ? result.exitCode : null,
      signal: result.signal ?? undefined,
    };
  }
}

// While an interactive child runs, an operator interrupt reaches it through the
// shared process group; this process must outlive it to run teardown.
function forwardSignals(child: execa.ExecaChildProcess): () => void {
  const onInterrupt = (): void => {
    logger.debug({ pid: child.pid }, 'Interrupt received, waiting for child to exit');
  };
  const onTerminate = (signal: NodeJS.Signals): void => {
    logger.debug({ pid: child.pid, signal }, 'Forwarding signal to child');
    child.kill(signal);
  };
  process.on('SIGINT', onInterrupt);
  process.on('SIGTERM', onTerminate);
  process.on('SIGHUP', onTerminate);
  return () => {
    process.off('SIGINT', onInterrupt);
    process.off('SIGTERM', onTerminate);
    process.off('SIGHUP', onTerminate);
  };
}

export async function runOrThrow(runner: ToolRunner, invocation: ToolInvocation): Promise<ToolResult> {
  const result = await runner.run(invocation);
  if (result.exitCode !== 0) {
    const status = result.exitCode === null ? `signal ${result.signal ?? 'unknown'}` : `exit ${result.exitCode}`;
    const detail = result.stderr.trim().split('\n')[0];
    throw new ToolInvocationError(
      `${[invocation.command, ...invocation.args].join(' ')} failed (${status})${detail ? `: ${detail}` : ''}`,
      { command: invocation.command, args: invocation.args, exitCode: result.exitCode, stderr: result.stderr }
    );
  }
  return result;
}

export async function findOnPath(runner: ToolRunner, tool: string): Promise<string | null> {
  const result = await runner.run({ command: 'which', args: [tool], captureStdout: true });
  if (result.exitCode !== 0) return null;
  const found = result.stdout.trim();
  return found || null;
}

import { Command, CommanderError, Option } from 'commander';
import { CertificateCodec } from './certs/codec.js';
import { GitOriginalAssetSource } from './certs/original-source.js';
import { CertificateSubstitutor } from './certs/substitutor.js';
import { interceptionCertPath, loadSettings, type Settings } from './config/loader.js';
import { HelperNetworkProxyConfigurator } from './network/proxy-config.js';
import { ProxyProcessLauncher } from './proxy/launcher.js';
import { buildSessionConfig, type SessionConfig } from './session/config.js';
import { exitCodeFor, formatSessionReport, SessionOrchestrator } from './session/orchestrator.js';
import { assertPreflight, formatPreflight, preflight, type PreflightCheck } from './session/preflight.js';
import { toError } from './shared/errors.js';
import { ExecaToolRunner, type ToolRunner } from './shared/exec.js';
import { logger, setVerbose } from './shared/logger.js';

export interface CliContext {
  runner: ToolRunner;
  env: NodeJS.ProcessEnv;
  print: (line: string) => void;
  printError: (line: string) => void;
  // Parent directory for session temp dirs; os.tmpdir() when unset.
  tempRoot?: string;
}

interface TargetOptions {
  appRoot?: string;
  signalRoot?: string;
  cert?: string;
  config?: string;
}

interface StartOptions extends TargetOptions {
  script: string[];
  webUi: boolean;
  networkProxy: boolean;
  verbose: boolean;
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

function addTargetOptions(command: Command): Command {
  return command
    .option('--app-root <path>', 'root of the app checkout that holds the pinned certificate')
    .addOption(new Option('--signal-root <path>', 'alias of --app-root').hideHelp())
    .option('--cert <relative>', 'pinned certificate path, relative to the app root')
    .option('--config <file>', 'settings file (default ~/.config/pinswap/config.yaml)');
}

async function prepare(
  opts: TargetOptions & Partial<Pick<StartOptions, 'script' | 'webUi' | 'networkProxy'>>,
  ctx: CliContext
): Promise<{ settings: Settings; config: SessionConfig }> {
  const { settings, configPath, fromFile } = await loadSettings({ configPath: opts.config, env: ctx.env });
  logger.debug({ configPath, fromFile }, 'Using settings');
  const config = await buildSessionConfig(
    {
      appRoot: opts.appRoot ?? opts.signalRoot ?? '',
      scriptPaths: opts.script,
      webUi: opts.webUi,
      skipNetworkProxyConfig: opts.networkProxy === undefined ? undefined : !opts.networkProxy,
      pinnedCertificate: opts.cert,
    },
    { pinnedCertificate: settings.app.pinnedCertificate }
  );
  return { settings, config };
}

async function startCommand(opts: StartOptions, ctx: CliContext): Promise<number> {
  setVerbose(opts.verbose);

  let settings: Settings;
  let config: SessionConfig;
  try {
    ({ settings, config } = await prepare(opts, ctx));
    const originals = new GitOriginalAssetSource(ctx.runner, settings.tools.git);
    assertPreflight(await preflight(config, settings, { runner: ctx.runner, originals }));
  } catch (err) {
    ctx.printError(`✗ ${toError(err).message}`);
    return 1;
  }

  const codec = new CertificateCodec(ctx.runner, settings.tools.openssl);
  const orchestrator = new SessionOrchestrator(
    {
      codec,
      substitutor: new CertificateSubstitutor(codec, new GitOriginalAssetSource(ctx.runner, settings.tools.git)),
      networkProxy: new HelperNetworkProxyConfigurator(ctx.runner, settings.network.helper),
      launcher: new ProxyProcessLauncher(ctx.runner, settings.proxy),
    },
    {
      interceptionCertPath: interceptionCertPath(settings),
      proxyHost: settings.proxy.listenHost,
      proxyPort: settings.proxy.listenPort,
      tempRoot: ctx.tempRoot,
    }
  );

  const report = await orchestrator.run(config);
  const exitCode = exitCodeFor(report);
  const write = exitCode === 0 ? ctx.print : ctx.printError;
  for (const line of formatSessionReport(report, { git: settings.tools.git, networkHelper: settings.network.helper })) {
    write(line);
  }
  return exitCode;
}

async function doctorCommand(opts: TargetOptions, ctx: CliContext): Promise<number> {
  let checks: PreflightCheck[];
  try {
    const { settings, config } = await prepare(opts, ctx);
    const originals = new GitOriginalAssetSource(ctx.runner, settings.tools.git);
    checks = await preflight(config, settings, { runner: ctx.runner, originals });
  } catch (err) {
    ctx.printError(`✗ ${toError(err).message}`);
    return 1;
  }

  for (const line of formatPreflight(checks)) ctx.print(line);
  const failed = checks.filter(c => !c.ok).length;
  ctx.print(failed === 0 ? 'All checks passed.' : `${failed} check(s) failed.`);
  return failed === 0 ? 0 : 1;
}

export function buildProgram(ctx: CliContext, onExit: (code: number) => void): Command {
  const program = new Command();
  program
    .name('pinswap')
    .description('Swap an app\'s pinned certificate for an interception proxy CA for one proxy session, then put it back')
    .exitOverride()
    .configureOutput({
      writeOut: s => ctx.print(s.trimEnd()),
      writeErr: s => ctx.printError(s.trimEnd()),
    });

  addTargetOptions(program.command('start').description('Run one interception session'))
    .option('--script <path>', 'proxy addon script to load (repeatable)', collect, [])
    .option('--web-ui', 'use the web UI instead of the console UI', false)
    .option('--no-network-proxy', 'leave the system network proxy settings alone (physical devices)')
    .option('-v, --verbose', 'debug logging on stderr', false)
    .action(async (opts: StartOptions) => {
      onExit(await startCommand(opts, ctx));
    });

  addTargetOptions(program.command('doctor').description('Check tools and certificates without changing anything')).action(
    async (opts: TargetOptions) => {
      onExit(await doctorCommand(opts, ctx));
    }
  );

  return program;
}

/** Parses argv (without the node and script entries) and returns the process exit code. */
export async function main(argv: readonly string[], overrides: Partial<CliContext> = {}): Promise<number> {
  const ctx: CliContext = {
    runner: overrides.runner ?? new ExecaToolRunner(),
    env: overrides.env ?? process.env,
    print: overrides.print ?? (line => console.log(line)),
    printError: overrides.printError ?? (line => console.error(line)),
    tempRoot: overrides.tempRoot,
  };

  let exitCode = 0;
  const program = buildProgram(ctx, code => {
    exitCode = code;
  });
  try {
    await program.parseAsync([...argv], { from: 'user' });
  } catch (err) {
    if (err instanceof CommanderError) return err.exitCode;
    throw err;
  }
  return exitCode;
}

import { runOrThrow, type ToolRunner } from '../shared/exec.js';
import { logger } from '../shared/logger.js';

/**
 * System-wide network proxy toggle. disable() is safe to call whether or not
 * enable() ran or succeeded.
 */
export interface NetworkProxyConfigurator {
  enable(host: string, port: number): Promise<void>;
  disable(): Promise<void>;
}

// Delegates to a helper script taking `set <host> <port>` and `disable`.
export class HelperNetworkProxyConfigurator implements NetworkProxyConfigurator {
  constructor(
    private readonly runner: ToolRunner,
    readonly helper = 'manage_proxy'
  ) {}

  async enable(host: string, port: number): Promise<void> {
    await runOrThrow(this.runner, { command: this.helper, args: ['set', host, String(port)] });
    logger.info({ host, port }, 'System network proxy enabled');
  }

  async disable(): Promise<void> {
    await runOrThrow(this.runner, { command: this.helper, args: ['disable'] });
    logger.info('System network proxy disabled');
  }
}

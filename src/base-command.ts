import { Command, Config, Errors, Flags, Interfaces } from '@oclif/core';
import chalk from 'chalk';
import AppService from './app-config/service';
import ApiError from './common/errors/api-error';

export default abstract class BaseCommand extends Command {
  app: AppService;
  verbose = false;

  static flags = {
    'api-key': Flags.string({
      description: 'Render API key',
      env: 'RENDER_API_KEY',
    }),
    verbose: Flags.boolean({
      description: 'Print request details and API responses',
      char: 'v',
      default: false,
    }),
  };

  constructor(argv: string[], config: Config) {
    super(argv, config);
    this.app = AppService.create(this.config.configDir, this.config.version);
  }

  /**
   * Applies the flags every command shares: the API credential and verbosity.
   */
  protected useBaseFlags(flags: { 'api-key'?: string, verbose?: boolean }): void {
    this.app.setApiKey(flags['api-key']);
    this.verbose = Boolean(flags.verbose) || this.app.config.log_level === 'debug';
  }

  logVerbose(message: string): void {
    if (this.verbose) {
      this.log(chalk.gray(message));
    }
  }

  async catch(error: Interfaces.CommandError): Promise<void> {
    // help and version exit through here
    if (error instanceof Errors.CLIError && error.oclif.exit === 0) return;

    this.debug(error.stack);
    const message = error instanceof ApiError ? error.describe() : error.message;
    this.error(message, { exit: 1 });
  }
}

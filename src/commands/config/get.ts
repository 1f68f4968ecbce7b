import { Args } from '@oclif/core';
import AppConfig from '../../app-config/config';
import BaseCommand from '../../base-command';
import InvalidConfigOption from '../../common/errors/invalid-config-option';

export default class ConfigGet extends BaseCommand {
  static description = 'Get the value of a CLI config option';

  static examples = [
    'render-scale config:get ramp_up_interval',
  ];

  static args = {
    option: Args.string({
      description: 'Name of a config option',
      required: true,
    }),
  };

  async run(): Promise<void> {
    const { args } = await this.parse(ConfigGet);

    if (!AppConfig.isOption(args.option)) {
      throw new InvalidConfigOption(args.option);
    }

    this.log(String(this.app.config[args.option]));
  }
}

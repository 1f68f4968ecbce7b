import { Args } from '@oclif/core';
import AppConfig from '../../app-config/config';
import BaseCommand from '../../base-command';
import InvalidConfigOption from '../../common/errors/invalid-config-option';

export default class ConfigSet extends BaseCommand {
  static description = 'Set a new value for a CLI configuration option';

  static examples = [
    'render-scale config:set ramp_down_interval 90',
    'render-scale config:set log_level debug',
  ];

  static args = {
    option: Args.string({
      description: 'Name of a config option',
      required: true,
    }),
    value: Args.string({
      description: 'New value to assign to a config option',
      required: true,
    }),
  };

  async run(): Promise<void> {
    const { args } = await this.parse(ConfigSet);

    if (!AppConfig.isOption(args.option)) {
      throw new InvalidConfigOption(args.option);
    }

    this.app.config.set(args.option, args.value);
    this.app.saveConfig();
    this.log(`Successfully updated ${args.option} to ${args.value}`);
  }
}

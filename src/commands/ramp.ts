import { Args, Flags } from '@oclif/core';
import chalk from 'chalk';
import BaseCommand from '../base-command';
import RampUtils from '../render/ramp/ramp.utils';
import ScaleRequest from '../render/service/scale-request';
import ServiceUtils from '../render/service/service.utils';

export default class Ramp extends BaseCommand {
  static description = `Gradually scale a Render service to a target instance count, one instance at a time.
Waits ramp_up_interval seconds between increments and ramp_down_interval seconds between decrements unless --interval is given.`;

  static examples = [
    'render-scale ramp 6 --service srv-abc123',
    'render-scale ramp 2 --service srv-abc123 --interval 120',
  ];

  static flags = {
    ...BaseCommand.flags,
    ...ServiceUtils.flags,
    interval: Flags.integer({
      description: 'Seconds to wait between steps (overrides the configured ramp interval)',
      min: 0,
    }),
  };

  static args = {
    target: Args.string({
      description: 'Instance count to ramp to',
      required: true,
    }),
  };

  async run(): Promise<void> {
    const { args, flags } = await this.parse(Ramp);
    this.useBaseFlags(flags);

    const target = ScaleRequest.parseCount('target', args.target);
    const api = this.app.api;
    const service_id = flags.service;
    const current = await ServiceUtils.getInstanceCount(api, service_id);

    const direction = RampUtils.direction(current, target);
    if (direction === 'none') {
      this.log(`Service ${service_id} is already at ${target} instances`);
      return;
    }

    const configured_interval = direction === 'up' ? this.app.config.ramp_up_interval : this.app.config.ramp_down_interval;
    const interval = flags.interval ?? configured_interval;
    this.log(`Gradually scaling from ${current} to ${target} instances`);

    let applied = current;
    try {
      await RampUtils.ramp(api, {
        service_id,
        current,
        target,
        interval: interval * 1000,
        on_step: (num_instances, result) => {
          applied = num_instances;
          this.log(`Scaled service ${service_id} to ${num_instances} instances`);
          this.logVerbose(`HTTP ${result.status} ${result.body}`);
          if (num_instances !== target) {
            this.log(`Waiting ${interval} seconds before next ${direction === 'up' ? 'increment' : 'decrement'}...`);
          }
        },
      });
    } catch (err) {
      this.warn(`Ramp stopped; service ${service_id} was left at ${applied} instances`);
      throw err;
    }

    this.log(chalk.green(`Gradual scale-${direction} complete`));
  }
}

import { Flags } from '@oclif/core';
import chalk from 'chalk';
import BaseCommand from '../../base-command';
import AutoscaleUtils from '../../render/autoscale/autoscale.utils';
import ServiceUtils from '../../render/service/service.utils';

export default class AutoMetricBased extends BaseCommand {
  static description = `Scale by one instance based on a CPU reading from your monitoring system.
Above --scale-up-threshold the service gains an instance (up to --max-instances); below --scale-down-threshold it loses one (down to --min-instances).`;

  static examples = [
    'render-scale auto:metric-based --service srv-abc123 --cpu 92',
    'SCALE_DOWN_THRESHOLD=10 render-scale auto:metric-based --service srv-abc123 --cpu 4',
  ];

  static flags = {
    ...BaseCommand.flags,
    ...ServiceUtils.flags,
    ...AutoscaleUtils.flags,
    cpu: Flags.integer({
      description: 'Current CPU usage in percent',
      required: true,
      min: 0,
      max: 100,
    }),
    'scale-up-threshold': Flags.integer({
      description: 'CPU percent above which to add an instance',
      env: 'SCALE_UP_THRESHOLD',
      default: 80,
      min: 0,
      max: 100,
    }),
    'scale-down-threshold': Flags.integer({
      description: 'CPU percent below which to remove an instance',
      env: 'SCALE_DOWN_THRESHOLD',
      default: 20,
      min: 0,
      max: 100,
    }),
  };

  async run(): Promise<void> {
    const { flags } = await this.parse(AutoMetricBased);
    this.useBaseFlags(flags);
    const bounds = { min_instances: flags['min-instances'], max_instances: flags['max-instances'] };
    AutoscaleUtils.validateBounds(bounds);
    if (flags['scale-down-threshold'] > flags['scale-up-threshold']) {
      this.error('--scale-down-threshold must not be greater than --scale-up-threshold', { exit: 1 });
    }

    const api = this.app.api;
    const service_id = flags.service;
    const current = await ServiceUtils.getInstanceCount(api, service_id);
    this.logVerbose(`Current instances: ${current}`);

    const decision = AutoscaleUtils.metricDecision(flags.cpu, current, bounds, {
      scale_up: flags['scale-up-threshold'],
      scale_down: flags['scale-down-threshold'],
    });

    this.log(AutoscaleUtils.describe(service_id, decision));
    const result = await AutoscaleUtils.apply(api, service_id, decision);
    if (result) {
      this.log(chalk.green(`✓ Successfully scaled service ${service_id}`));
      this.logVerbose(`HTTP ${result.status} ${result.body}`);
    }
  }
}

import { Flags } from '@oclif/core';
import chalk from 'chalk';
import BaseCommand from '../../base-command';
import AutoscaleUtils, { ScalingDecision } from '../../render/autoscale/autoscale.utils';
import ServiceUtils from '../../render/service/service.utils';

export default class AutoDayBased extends BaseCommand {
  static description = `Scale based on the day of the week.
On Saturday and Sunday the service is scaled to --min-instances; on weekdays it is kept at --weekday-min instances or more.`;

  static examples = [
    'render-scale auto:day-based --service srv-abc123',
    'MIN_INSTANCES=0 render-scale auto:day-based --service srv-abc123 --weekday-min 3',
  ];

  static flags = {
    ...BaseCommand.flags,
    ...ServiceUtils.flags,
    ...AutoscaleUtils.flags,
    'weekday-min': Flags.integer({
      description: 'Minimum number of instances on weekdays',
      default: 2,
      min: 0,
    }),
  };

  async run(): Promise<void> {
    const { flags } = await this.parse(AutoDayBased);
    this.useBaseFlags(flags);
    AutoscaleUtils.validateBounds({ min_instances: flags['min-instances'], max_instances: flags['max-instances'] });

    const api = this.app.api;
    const service_id = flags.service;

    let decision: ScalingDecision;
    if (AutoscaleUtils.isWeekend(AutoscaleUtils.now())) {
      this.log('Weekend detected - scaling to minimum');
      decision = { action: 'scale', target: flags['min-instances'], reason: 'weekend' };
    } else {
      this.log('Weekday detected - ensuring normal capacity');
      const current = await ServiceUtils.getInstanceCount(api, service_id);
      decision = AutoscaleUtils.ensureAtLeast(current, flags['weekday-min'], 'weekday');
    }

    this.log(AutoscaleUtils.describe(service_id, decision));
    const result = await AutoscaleUtils.apply(api, service_id, decision);
    if (result) {
      this.log(chalk.green(`✓ Successfully scaled service ${service_id}`));
      this.logVerbose(`HTTP ${result.status} ${result.body}`);
    }
  }
}

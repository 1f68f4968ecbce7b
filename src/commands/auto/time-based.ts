import { Flags } from '@oclif/core';
import chalk from 'chalk';
import BaseCommand from '../../base-command';
import AutoscaleUtils, { ScalingDecision } from '../../render/autoscale/autoscale.utils';
import ServiceUtils from '../../render/service/service.utils';

export default class AutoTimeBased extends BaseCommand {
  static description = `Scale based on the time of day.
During business hours the service is kept at --business-min instances or more; outside them it is scaled to --min-instances.`;

  static examples = [
    'render-scale auto:time-based --service srv-abc123',
    'render-scale auto:time-based --service srv-abc123 --business-start 7 --business-end 20 --business-min 4',
  ];

  static flags = {
    ...BaseCommand.flags,
    ...ServiceUtils.flags,
    ...AutoscaleUtils.flags,
    'business-start': Flags.integer({
      description: 'Hour (local time) business hours start',
      default: 8,
      min: 0,
      max: 23,
    }),
    'business-end': Flags.integer({
      description: 'Hour (local time) business hours end',
      default: 18,
      min: 0,
      max: 24,
    }),
    'business-min': Flags.integer({
      description: 'Minimum number of instances during business hours',
      default: 3,
      min: 0,
    }),
  };

  async run(): Promise<void> {
    const { flags } = await this.parse(AutoTimeBased);
    this.useBaseFlags(flags);
    AutoscaleUtils.validateBounds({ min_instances: flags['min-instances'], max_instances: flags['max-instances'] });

    const api = this.app.api;
    const service_id = flags.service;
    const now = AutoscaleUtils.now();

    let decision: ScalingDecision;
    if (AutoscaleUtils.isBusinessHours(now, { start: flags['business-start'], end: flags['business-end'] })) {
      this.log(`Business hours detected - ensuring minimum ${flags['business-min']} instances`);
      const current = await ServiceUtils.getInstanceCount(api, service_id);
      decision = AutoscaleUtils.ensureAtLeast(current, flags['business-min'], 'business hours');
    } else {
      this.log('Off-hours detected - scaling down to minimum');
      decision = { action: 'scale', target: flags['min-instances'], reason: 'outside business hours' };
    }

    this.log(AutoscaleUtils.describe(service_id, decision));
    const result = await AutoscaleUtils.apply(api, service_id, decision);
    if (result) {
      this.log(chalk.green(`✓ Successfully scaled service ${service_id}`));
      this.logVerbose(`HTTP ${result.status} ${result.body}`);
    }
  }
}

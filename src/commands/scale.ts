import { Args, Flags } from '@oclif/core';
import chalk from 'chalk';
import BaseCommand from '../base-command';
import { Errors } from '../common/utils/errors';
import ScaleRequest from '../render/service/scale-request';
import ServiceUtils from '../render/service/service.utils';

export default class Scale extends BaseCommand {
  static description = 'Scale a Render service to a number of instances, or up/down by a relative amount.';

  static examples = [
    'render-scale scale srv-abc123 5',
    'render-scale scale srv-abc123 --increase-by 2',
    'render-scale scale srv-abc123 --decrease-by 1 --dry-run',
  ];

  static flags = {
    ...BaseCommand.flags,
    'increase-by': Flags.integer({
      description: 'Number of instances to add to the current count',
      min: 1,
      exclusive: ['decrease-by'],
    }),
    'decrease-by': Flags.integer({
      description: 'Number of instances to remove from the current count (stops at 0)',
      min: 1,
      exclusive: ['increase-by'],
    }),
    'dry-run': Flags.boolean({
      description: 'Show what would be done without scaling',
      default: false,
    }),
  };

  static args = {
    service_id: Args.string({
      description: 'Render service ID (e.g. srv-abc123)',
      required: true,
    }),
    num_instances: Args.string({
      description: 'Absolute number of instances to scale to',
      required: false,
    }),
  };

  async run(): Promise<void> {
    const { args, flags } = await this.parse(Scale);
    this.useBaseFlags(flags);

    const relative = flags['increase-by'] !== undefined || flags['decrease-by'] !== undefined;
    if (args.num_instances === undefined && !relative) {
      this.error('Provide a number of instances, --increase-by or --decrease-by', { exit: 1 });
    }
    if (args.num_instances !== undefined && relative) {
      this.error('A number of instances cannot be combined with --increase-by or --decrease-by', { exit: 1 });
    }

    const num_instances = args.num_instances === undefined ? undefined : ScaleRequest.parseCount('num_instances', args.num_instances);
    const api = this.app.api;
    const service_id = args.service_id;

    // Only look the service up when the current count matters
    let current: number | undefined;
    let service_name = service_id;
    if (relative || flags['dry-run'] || flags.verbose) {
      this.logVerbose(`Fetching service details for ${service_id}...`);
      const service = await ServiceUtils.getService(api, service_id);
      current = service.serviceDetails.numInstances;
      service_name = service.name || service_id;
      this.logVerbose(`Service: ${service_name}`);
      this.logVerbose(`Current instances: ${current}`);
    }

    let target: number;
    if (num_instances !== undefined) {
      target = num_instances;
    } else if (flags['increase-by'] !== undefined) {
      target = (current ?? 0) + flags['increase-by'];
    } else {
      target = Math.max(0, (current ?? 0) - (flags['decrease-by'] ?? 0));
    }

    const scale_request = new ScaleRequest(service_id, target);
    scale_request.validate();

    if (current !== undefined) {
      this.log(`Scaling service '${service_name}' (ID: ${service_id})`);
      this.log(`  Current instances: ${current}`);
      this.log(`  Target instances:  ${target}`);

      if (current === target) {
        this.log(chalk.yellow('Service is already at the target instance count. No action needed.'));
        return;
      }
    }

    if (flags['dry-run']) {
      this.log(chalk.yellow('[DRY RUN] Would scale service but --dry-run flag is set. Exiting.'));
      return;
    }

    const result = await ServiceUtils.scaleService(api, scale_request);
    this.log(chalk.green(`✓ Successfully scaled service ${service_id} to ${target} instances`));
    this.logVerbose(`HTTP ${result.status}`);
    if (result.body) {
      this.log(Errors.formatBody(result.body));
    }
  }
}

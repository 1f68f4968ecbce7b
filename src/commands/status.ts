import BaseCommand from '../base-command';
import ServiceUtils from '../render/service/service.utils';

export default class Status extends BaseCommand {
  static description = 'Show the current instance count of a Render service';

  static examples = [
    'render-scale status --service srv-abc123',
    'SERVICE_ID=srv-abc123 render-scale status',
  ];

  static flags = {
    ...BaseCommand.flags,
    ...ServiceUtils.flags,
  };

  async run(): Promise<void> {
    const { flags } = await this.parse(Status);
    this.useBaseFlags(flags);

    const service = await ServiceUtils.getService(this.app.api, flags.service);
    this.log(`Service: ${service.name || service.id}`);
    this.log(`Current instances: ${service.serviceDetails.numInstances}`);
    this.logVerbose(JSON.stringify(service, null, 2));
  }
}

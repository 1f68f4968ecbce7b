import { RenderScaleError } from '../utils/errors';

export default class InvalidConfigValue extends RenderScaleError {
  constructor(details: string) {
    super();
    this.name = 'invalid_config_value';
    this.message = `Invalid CLI configuration: ${details}`;
  }
}

import { RenderScaleError } from '../utils/errors';

export default class InvalidInstanceCountError extends RenderScaleError {
  constructor(details: string) {
    super();
    this.name = 'invalid_instance_count';
    this.message = `Invalid scale request: ${details}`;
  }
}

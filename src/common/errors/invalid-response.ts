import { RenderScaleError } from '../utils/errors';

export default class InvalidResponseError extends RenderScaleError {
  constructor(path: string, details: string) {
    super();
    this.name = 'invalid_response';
    this.message = `Unexpected response from ${path}: ${details}`;
  }
}

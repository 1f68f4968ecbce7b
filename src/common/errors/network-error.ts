import { Errors, RenderScaleError } from '../utils/errors';

export default class NetworkError extends RenderScaleError {
  readonly original_error: unknown;

  constructor(method: string, path: string, cause: unknown) {
    super();
    this.name = 'network_error';
    this.original_error = cause;
    this.message = `Unable to reach the Render API (${method} ${path}): ${Errors.messageOf(cause)}`;
  }
}

import { Errors, RenderScaleError } from '../utils/errors';

export default class ApiError extends RenderScaleError {
  readonly method: string;
  readonly path: string;
  readonly status: number;
  readonly body: string;

  constructor(method: string, path: string, status: number, body: string) {
    super();
    this.name = 'api_error';
    this.method = method;
    this.path = path;
    this.status = status;
    this.body = body;
    this.message = `Call to ${method} ${path} returned HTTP ${status}`;
  }

  /**
   * The status line followed by the response body, pretty-printed when it is JSON.
   */
  describe(): string {
    return this.body ? `${this.message}\n${Errors.formatBody(this.body)}` : this.message;
  }
}

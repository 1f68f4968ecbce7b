import { RenderScaleError } from '../utils/errors';

export default class AuthError extends RenderScaleError {
  constructor() {
    super();
    this.name = 'auth_error';
    this.message = 'No Render API key found. Set the RENDER_API_KEY environment variable or pass --api-key.';
  }
}

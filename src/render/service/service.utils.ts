import { Flags } from '@oclif/core';
import { AxiosInstance, AxiosResponse, Method } from 'axios';
import { plainToInstance } from 'class-transformer';
import { validateSync } from 'class-validator';
import ApiError from '../../common/errors/api-error';
import InvalidResponseError from '../../common/errors/invalid-response';
import NetworkError from '../../common/errors/network-error';
import ScaleRequest from './scale-request';
import Service from './service.entity';

export interface ScaleResult {
  status: number;
  body: string;
}

export default class ServiceUtils {
  static flags = {
    service: Flags.string({
      description: 'Render service ID (e.g. srv-abc123)',
      char: 's',
      env: 'SERVICE_ID',
      required: true,
    }),
  };

  static isSuccess(status: number): boolean {
    return status >= 200 && status < 300;
  }

  static async getService(api: AxiosInstance, service_id: string): Promise<Service> {
    const path = `/services/${encodeURIComponent(service_id)}`;
    const { body } = await this.request(api, 'GET', path);

    let payload: unknown;
    try {
      payload = JSON.parse(body);
    } catch {
      throw new InvalidResponseError(path, 'body is not valid JSON');
    }
    if (typeof payload !== 'object' || payload === null || Array.isArray(payload)) {
      throw new InvalidResponseError(path, 'expected a service object');
    }

    const service = plainToInstance(Service, payload);
    const errors = validateSync(service);
    if (errors.some(error => error.property === 'serviceDetails')) {
      throw new InvalidResponseError(path, `service ${service_id} does not report an instance count`);
    }
    if (errors.length > 0) {
      const details = errors.flatMap(error => Object.values(error.constraints || {}));
      throw new InvalidResponseError(path, details.join(', '));
    }
    return service;
  }

  static async getInstanceCount(api: AxiosInstance, service_id: string): Promise<number> {
    const service = await this.getService(api, service_id);
    return service.serviceDetails.numInstances;
  }

  static async scaleService(api: AxiosInstance, scale_request: ScaleRequest): Promise<ScaleResult> {
    scale_request.validate();
    const path = `/services/${encodeURIComponent(scale_request.service_id)}/scale`;
    return this.request(api, 'POST', path, scale_request.toDto());
  }

  /**
   * Sends one request and classifies the outcome. Transport failures become a
   * NetworkError and any status outside [200,300) an ApiError. No retries.
   */
  protected static async request(api: AxiosInstance, method: Method, path: string, data?: object): Promise<ScaleResult> {
    let response: AxiosResponse<string>;
    try {
      response = await api.request<string>({
        method,
        url: path,
        data,
        responseType: 'text',
        transformResponse: (body: string) => body,
        validateStatus: () => true,
      });
    } catch (err) {
      throw new NetworkError(method, path, err);
    }

    const body = typeof response.data === 'string' ? response.data : '';
    if (!this.isSuccess(response.status)) {
      throw new ApiError(method, path, response.status, body);
    }
    return { status: response.status, body };
  }
}

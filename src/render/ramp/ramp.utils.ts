import { AxiosInstance } from 'axios';
import InvalidInstanceCountError from '../../common/errors/invalid-instance-count';
import ScaleRequest from '../service/scale-request';
import ServiceUtils, { ScaleResult } from '../service/service.utils';

export type RampDirection = 'up' | 'down' | 'none';

export interface RampOptions {
  service_id: string;
  current: number;
  target: number;
  // milliseconds between two scale requests
  interval: number;
  on_step?: (num_instances: number, result: ScaleResult) => void;
}

export default class RampUtils {
  static direction(current: number, target: number): RampDirection {
    if (target > current) {
      return 'up';
    } else if (target < current) {
      return 'down';
    }
    return 'none';
  }

  /**
   * Intermediate targets walking from `current` to `target` one instance at a
   * time. `current` itself is excluded and `target` is the last entry.
   */
  static planSteps(current: number, target: number): number[] {
    for (const [name, value] of [['current', current], ['target', target]] as const) {
      if (!Number.isInteger(value) || value < 0) {
        throw new InvalidInstanceCountError(`${name} instance count must be a non-negative integer, got ${value}`);
      }
    }

    const step = target > current ? 1 : -1;
    const steps: number[] = [];
    for (let num_instances = current; num_instances !== target;) {
      num_instances += step;
      steps.push(num_instances);
    }
    return steps;
  }

  static async sleep(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
  }

  /**
   * Scales the service one instance at a time, pausing `interval` between
   * requests. The first failing request aborts the ramp and its error is
   * rethrown; the service stays at the last count reported through `on_step`.
   */
  static async ramp(api: AxiosInstance, options: RampOptions): Promise<number[]> {
    const steps = RampUtils.planSteps(options.current, options.target);

    for (const [index, num_instances] of steps.entries()) {
      if (index > 0) {
        await RampUtils.sleep(options.interval);
      }
      const result = await ServiceUtils.scaleService(api, new ScaleRequest(options.service_id, num_instances));
      options.on_step?.(num_instances, result);
    }
    return steps;
  }
}

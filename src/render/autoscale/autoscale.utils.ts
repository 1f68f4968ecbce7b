import { Flags } from '@oclif/core';
import { AxiosInstance } from 'axios';
import InvalidInstanceCountError from '../../common/errors/invalid-instance-count';
import ScaleRequest from '../service/scale-request';
import ServiceUtils, { ScaleResult } from '../service/service.utils';

export type ScalingDecision =
  | { action: 'scale', target: number, reason: string }
  | { action: 'noop', reason: string };

export interface InstanceBounds {
  min_instances: number;
  max_instances: number;
}

export interface BusinessHours {
  // first hour (0-23, local time) inside business hours
  start: number;
  // first hour after business hours
  end: number;
}

export interface CpuThresholds {
  scale_up: number;
  scale_down: number;
}

export default class AutoscaleUtils {
  static flags = {
    'min-instances': Flags.integer({
      description: 'Minimum number of instances',
      env: 'MIN_INSTANCES',
      default: 1,
      min: 0,
    }),
    'max-instances': Flags.integer({
      description: 'Maximum number of instances',
      env: 'MAX_INSTANCES',
      default: 10,
      min: 0,
    }),
  };

  static validateBounds(bounds: InstanceBounds): void {
    if (bounds.min_instances > bounds.max_instances) {
      throw new InvalidInstanceCountError(`min instances (${bounds.min_instances}) is greater than max instances (${bounds.max_instances})`);
    }
  }

  static now(): Date {
    return new Date();
  }

  static isBusinessHours(date: Date, hours: BusinessHours): boolean {
    const hour = date.getHours();
    return hour >= hours.start && hour < hours.end;
  }

  // Saturday or Sunday
  static isWeekend(date: Date): boolean {
    const day = date.getDay();
    return day === 0 || day === 6;
  }

  static ensureAtLeast(current: number, minimum: number, reason: string): ScalingDecision {
    if (current < minimum) {
      return { action: 'scale', target: minimum, reason };
    }
    return { action: 'noop', reason: `${current} instances already meets the minimum of ${minimum}` };
  }

  static metricDecision(cpu: number, current: number, bounds: InstanceBounds, thresholds: CpuThresholds): ScalingDecision {
    if (cpu > thresholds.scale_up) {
      const target = current + 1;
      if (target <= bounds.max_instances) {
        return { action: 'scale', target, reason: `CPU ${cpu}% is above ${thresholds.scale_up}%` };
      }
      return { action: 'noop', reason: `CPU ${cpu}% is high but the service is at the maximum of ${bounds.max_instances} instances` };
    }

    if (cpu < thresholds.scale_down) {
      const target = current - 1;
      if (target >= bounds.min_instances) {
        return { action: 'scale', target, reason: `CPU ${cpu}% is below ${thresholds.scale_down}%` };
      }
      return { action: 'noop', reason: `CPU ${cpu}% is low but the service is at the minimum of ${bounds.min_instances} instances` };
    }

    return { action: 'noop', reason: `CPU ${cpu}% is within ${thresholds.scale_down}%-${thresholds.scale_up}%` };
  }

  static describe(service_id: string, decision: ScalingDecision): string {
    if (decision.action === 'noop') {
      return `No action needed for service ${service_id}: ${decision.reason}`;
    }
    return `Scaling service ${service_id} to ${decision.target} instances: ${decision.reason}`;
  }

  /**
   * Sends the scale request for a `scale` decision. Returns undefined for `noop`.
   */
  static async apply(api: AxiosInstance, service_id: string, decision: ScalingDecision): Promise<ScaleResult | undefined> {
    if (decision.action === 'noop') {
      return undefined;
    }
    return ServiceUtils.scaleService(api, new ScaleRequest(service_id, decision.target));
  }
}

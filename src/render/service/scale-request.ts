import 'reflect-metadata';
import { IsInt, IsNotEmpty, IsString, Min, validateSync } from 'class-validator';
import InvalidInstanceCountError from '../../common/errors/invalid-instance-count';

export interface ScaleServiceDto {
  numInstances: number;
}

export default class ScaleRequest {
  @IsString()
  @IsNotEmpty()
  readonly service_id: string;

  @IsInt({ message: 'num_instances must be a whole number' })
  @Min(0, { message: 'num_instances must not be negative' })
  readonly num_instances: number;

  constructor(service_id: string, num_instances: number) {
    this.service_id = service_id;
    this.num_instances = num_instances;
  }

  /**
   * Parses an instance count typed on the command line. Only plain digits are
   * accepted, so `2.5`, `-1` and `1e3` are rejected before any request is built.
   */
  static parseCount(name: string, value: string): number {
    if (!/^\d+$/.test(value)) {
      throw new InvalidInstanceCountError(`${name} must be a non-negative integer, got "${value}"`);
    }
    return Number(value);
  }

  validate(): void {
    const errors = validateSync(this);
    if (errors.length > 0) {
      const details = errors.flatMap(error => Object.values(error.constraints || {}));
      throw new InvalidInstanceCountError(details.join(', '));
    }
  }

  toDto(): ScaleServiceDto {
    return { numInstances: this.num_instances };
  }
}

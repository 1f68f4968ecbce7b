import 'reflect-metadata';
import { Type } from 'class-transformer';
import { IsDefined, IsInt, IsNotEmpty, IsOptional, IsString, Min, ValidateNested } from 'class-validator';

export class ServiceDetails {
  @IsInt()
  @Min(0)
  numInstances!: number;
}

/**
 * The fields of a Render service that the CLI reads. Everything else in the
 * API payload is ignored.
 */
export default class Service {
  @IsString()
  @IsNotEmpty()
  id!: string;

  @IsOptional()
  @IsString()
  name?: string;

  @IsDefined()
  @ValidateNested()
  @Type(() => ServiceDetails)
  serviceDetails!: ServiceDetails;
}

export { run } from '@oclif/core';
export { default as AppConfig } from './app-config/config';
export type { ConfigOption, LogLevel } from './app-config/config';
export { default as AppService } from './app-config/service';
export { default as ApiError } from './common/errors/api-error';
export { default as AuthError } from './common/errors/auth-error';
export { default as InvalidConfigOption } from './common/errors/invalid-config-option';
export { default as InvalidConfigValue } from './common/errors/invalid-config-value';
export { default as InvalidInstanceCountError } from './common/errors/invalid-instance-count';
export { default as InvalidResponseError } from './common/errors/invalid-response';
export { default as NetworkError } from './common/errors/network-error';
export { RenderScaleError } from './common/utils/errors';
export type { Dictionary } from './common/utils/types';
export { default as AutoscaleUtils } from './render/autoscale/autoscale.utils';
export type { BusinessHours, CpuThresholds, InstanceBounds, ScalingDecision } from './render/autoscale/autoscale.utils';
export { default as RampUtils } from './render/ramp/ramp.utils';
export type { RampDirection, RampOptions } from './render/ramp/ramp.utils';
export { default as ScaleRequest } from './render/service/scale-request';
export type { ScaleServiceDto } from './render/service/scale-request';
export { default as Service, ServiceDetails } from './render/service/service.entity';
export { default as ServiceUtils } from './render/service/service.utils';
export type { ScaleResult } from './render/service/service.utils';

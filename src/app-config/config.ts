import 'reflect-metadata';
import { IsIn, IsInt, IsUrl, Min, validateSync } from 'class-validator';
import fs from 'fs-extra';
import path from 'path';
import { Dictionary } from '../common/utils/types';
import InvalidConfigValue from '../common/errors/invalid-config-value';
import LocalPaths from '../paths';

export const CONFIG_OPTIONS = ['log_level', 'api_host', 'request_timeout', 'ramp_up_interval', 'ramp_down_interval'] as const;

export type ConfigOption = typeof CONFIG_OPTIONS[number];

export type LogLevel = 'info' | 'debug';

export default class AppConfig {
  private config_dir: string;

  @IsIn(['info', 'debug'])
  log_level: LogLevel;

  @IsUrl({ require_tld: false, require_protocol: true, protocols: ['http', 'https'] })
  api_host: string;

  // milliseconds
  @IsInt()
  @Min(1)
  request_timeout: number;

  // seconds
  @IsInt()
  @Min(0)
  ramp_up_interval: number;

  @IsInt()
  @Min(0)
  ramp_down_interval: number;

  constructor(config_dir: string, partial?: Partial<Pick<AppConfig, ConfigOption>>) {
    this.config_dir = config_dir;

    // Set defaults
    this.log_level = 'info';
    this.api_host = 'https://api.render.com/v1';
    this.request_timeout = 10000;
    this.ramp_up_interval = 30;
    this.ramp_down_interval = 60;

    // Override defaults with input values
    if (partial) {
      for (const option of CONFIG_OPTIONS) {
        if (partial[option] !== undefined) {
          Object.assign(this, { [option]: partial[option] });
        }
      }
    }
  }

  static isOption(option: string): option is ConfigOption {
    return CONFIG_OPTIONS.some(known => known === option);
  }

  /**
   * Assigns a value given as text (as typed on the command line) to an option.
   */
  set(option: ConfigOption, value: string): void {
    switch (option) {
      case 'log_level':
        if (value !== 'info' && value !== 'debug') {
          throw new InvalidConfigValue(`log_level must be one of: info, debug`);
        }
        this.log_level = value;
        break;
      case 'api_host':
        this.api_host = value;
        break;
      case 'request_timeout':
      case 'ramp_up_interval':
      case 'ramp_down_interval':
        this[option] = Number(value);
        break;
    }
    this.validate();
  }

  validate(): void {
    const errors = validateSync(this);
    if (errors.length > 0) {
      const details = errors.flatMap(error => Object.values(error.constraints || {}));
      throw new InvalidConfigValue(details.join(', '));
    }
  }

  save(): void {
    const config_file = path.join(this.config_dir, LocalPaths.CLI_CONFIG_FILENAME);
    fs.writeJSONSync(config_file, this.toJSON(), { spaces: 2 });
  }

  toJSON(): Dictionary<string | number> {
    return {
      log_level: this.log_level,
      api_host: this.api_host,
      request_timeout: this.request_timeout,
      ramp_up_interval: this.ramp_up_interval,
      ramp_down_interval: this.ramp_down_interval,
    };
  }
}

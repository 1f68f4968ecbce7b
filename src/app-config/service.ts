import axios, { AxiosInstance } from 'axios';
import fs from 'fs-extra';
import os from 'os';
import path from 'path';
import AuthError from '../common/errors/auth-error';
import LocalPaths from '../paths';
import AppConfig from './config';

export default class AppService {
  config: AppConfig;
  version: string;
  private api_key?: string;
  private _api: AxiosInstance;

  static create(config_dir: string, version: string): AppService {
    return new AppService(config_dir, version);
  }

  constructor(config_dir: string, version: string) {
    this.config = new AppConfig(config_dir);
    this.version = version;
    if (config_dir) {
      const config_file = path.join(config_dir, LocalPaths.CLI_CONFIG_FILENAME);
      if (fs.existsSync(config_file)) {
        const payload = fs.readJSONSync(config_file);
        this.config = new AppConfig(config_dir, payload);
        this.config.validate();
      }
    }

    this._api = axios.create({
      baseURL: this.config.api_host,
      timeout: this.config.request_timeout,
      headers: {
        'Accept': 'application/json',
        'Content-Type': 'application/json',
        'User-Agent': `render-scale/cli ${this.version} ${os.platform()} ${os.type()}/${os.release()}`,
      },
    });
  }

  setApiKey(api_key?: string): void {
    this.api_key = api_key || undefined;
  }

  saveConfig(): void {
    this.config.save();
  }

  get api(): AxiosInstance {
    if (!this.api_key) {
      throw new AuthError();
    }
    this._api.defaults.headers.common.Authorization = `Bearer ${this.api_key}`;
    return this._api;
  }
}

export default class LocalPaths {
  static CLI_CONFIG_FILENAME = 'config.json';
}

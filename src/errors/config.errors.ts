export class ConfigParseError extends Error {
  constructor(configPath: string, message: string) {
    super(`Invalid config file ${configPath}: ${message}`);
    this.name = "ConfigParseError";
  }
}

export class ConfigInvalidOutputFormatError extends Error {
  constructor(value: string) {
    super(`Unsupported output format "${value}". Use text or json.`);
    this.name = "ConfigInvalidOutputFormatError";
  }
}

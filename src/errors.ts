/**
 * Raised for anything wrong with how loopguard was configured: a missing prompt
 * file, an out-of-range timeout, an invalid config.yaml. Fatal before the loop starts.
 */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * A persisted state file exists but cannot be parsed or fails validation.
 */
export class StateFileError extends Error {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'StateFileError';
  }
}

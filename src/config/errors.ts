export class ConfigError extends Error {
  readonly code = 'CONFIG_INVALID'

  constructor(readonly problems: string[]) {
    super(`Assistant configuration validation failed:\n${problems.join('\n')}`)
    Object.setPrototypeOf(this, ConfigError.prototype)
    this.name = 'ConfigError'
  }
}

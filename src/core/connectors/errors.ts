/**
 * Raised while a connector is being constructed with unusable settings
 * (missing base URL, no complete credential shape). Everything after
 * construction reports failures as `ConnectorResult` values instead.
 */
export class ConfigurationError extends Error {
  readonly system: string;

  constructor(system: string, message: string) {
    super(`${system}: ${message}`);
    this.name = "ConfigurationError";
    this.system = system;
  }
}

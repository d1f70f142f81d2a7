/**
 * Raised for authoring mistakes (bad speeds, malformed shapes, unknown
 * handlers). Thrown at registration or activation time, before any effect
 * has been scheduled.
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

/**
 * Retry configuration with exponential backoff
 */
export type RetryConfig = {
  /** Maximum number of retry attempts */
  maxRetries: number;
  /** Initial timeout in milliseconds */
  initialTimeout: number;
  /** Multiplier for exponential backoff (e.g., 2 = double each time) */
  backoffMultiplier: number;
  /** Percentage of jitter to add (0-100) to avoid thundering herd */
  jitterPercentage: number;
};

/**
 * Raw configuration from YAML (before env var resolution)
 */
export type RawConfig = Record<string, unknown>;

// =============================================================================
// HTTP STATUS CODES
// =============================================================================

export const HttpStatus = {
  BAD_REQUEST: 400,
  INTERNAL_SERVER_ERROR: 500,
  OK: 200,
  SERVICE_UNAVAILABLE: 503,
  UNAUTHORIZED: 401,
} as const;

// =============================================================================
// DEFAULTS
// =============================================================================

export const Defaults = {
  /** Upload body cap. Full exports with routes and ECG voltages get large. */
  bodyLimit: '50mb',
  host: '0.0.0.0',
  port: 8080,
  shutdownTimeoutMs: 10_000,

  /** Rows per INSERT statement. */
  insertBatchSize: 1000,

  writeConcurrency: 2,
  writeQueueSize: 100,
  writeTimeoutMs: 120_000,

  /** Startup ping retries against the store. */
  connectRetries: 3,
  connectRetryBaseDelayMs: 1000,
} as const;

/** Header carrying the upload token when `UPLOAD_TOKEN` is set. */
export const AUTH_HEADER = 'api-key';

// Environment variables read by the server and the CLI

export interface Env {
  // Server
  PORT?: string;
  HOST?: string;
  NODE_ENV?: string;
  LOG_LEVEL?: string;

  // CORS
  ALLOWED_ORIGINS?: string;

  // Central directory probing
  PROBE_STEP?: string;
  PROBE_MAX_ATTEMPTS?: string;
  LEADING_BYTES?: string;

  // Reports
  REPORT_DIR?: string;
  REPORT_SHARD_SIZE?: string;
  REPORT_CONCURRENCY?: string;
}

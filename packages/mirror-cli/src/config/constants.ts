import { PACKAGES_BASE_URL, SERVICES_BASE_URL } from "@helpmirror/catalog-service";

export const CLI_VERSION = "0.1.0";

/**
 * Catalog service configuration
 */
export const SERVICE_CONFIG = {
  /** Base address of the catalog service */
  SERVICES_BASE_URL,

  /** Base address package links resolve against */
  PACKAGES_BASE_URL,

  /** Catalog request timeout in milliseconds */
  REQUEST_TIMEOUT_MS: 60000,
} as const;

/**
 * Package download configuration
 */
export const DOWNLOAD_CONFIG = {
  /** Download attempts per package */
  MAX_RETRY_ATTEMPTS: 3,

  /** Delay before a retry in milliseconds, multiplied by the attempt number */
  RETRY_DELAY_MS: 1000,

  /** Time without received data before an attempt is aborted, in milliseconds */
  IDLE_TIMEOUT_MS: 60000,

  /** Minimum interval between per-file progress lines in milliseconds */
  PROGRESS_INTERVAL_MS: 250,
} as const;

/**
 * Default settings file, looked up in the working directory
 */
export const DEFAULT_SETTINGS_FILE = "helpmirror.json";

/**
 * Environment variable keys
 */
export const ENV_KEYS = {
  HELPMIRROR_CONFIG: "HELPMIRROR_CONFIG",
  HELPMIRROR_CACHE_DIR: "HELPMIRROR_CACHE_DIR",
  HELPMIRROR_LOG_DIR: "HELPMIRROR_LOG_DIR",
  LOG_LEVEL: "LOG_LEVEL",
} as const;

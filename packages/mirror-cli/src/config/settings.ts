import { readFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { z } from "zod";
import { InvalidArgumentError, errnoCode } from "@helpmirror/catalog-sdk";
import {
  DEFAULT_SETTINGS_FILE,
  DOWNLOAD_CONFIG,
  ENV_KEYS,
  SERVICE_CONFIG,
} from "./constants.js";

export const ProxySettingsSchema = z
  .object({
    address: z.string().url(),
    login: z.string().min(1).optional(),
    password: z.string().optional(),
    domain: z.string().min(1).optional(),
  })
  .strict();

export const DownloadSettingsSchema = z
  .object({
    maxRetries: z.number().int().min(1).max(10).default(DOWNLOAD_CONFIG.MAX_RETRY_ATTEMPTS),
    retryDelayMs: z.number().int().nonnegative().default(DOWNLOAD_CONFIG.RETRY_DELAY_MS),
    idleTimeoutMs: z.number().int().positive().default(DOWNLOAD_CONFIG.IDLE_TIMEOUT_MS),
    progressIntervalMs: z
      .number()
      .int()
      .nonnegative()
      .default(DOWNLOAD_CONFIG.PROGRESS_INTERVAL_MS),
  })
  .strict();

export const MirrorSettingsSchema = z
  .object({
    proxy: ProxySettingsSchema.optional(),
    servicesBaseUrl: z.string().url().default(SERVICE_CONFIG.SERVICES_BASE_URL),
    packagesBaseUrl: z.string().url().default(SERVICE_CONFIG.PACKAGES_BASE_URL),
    requestTimeoutMs: z.number().int().positive().default(SERVICE_CONFIG.REQUEST_TIMEOUT_MS),
    download: DownloadSettingsSchema.default({}),
    cacheDirectory: z.string().min(1).optional(),
    logDirectory: z.string().min(1).optional(),
  })
  .strict();

export type MirrorSettings = z.infer<typeof MirrorSettingsSchema>;

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    .join("; ");
}

/**
 * Validates raw settings, filling in defaults
 * @throws InvalidArgumentError listing every invalid field
 */
export function parseSettings(raw: unknown, source = "settings"): MirrorSettings {
  const result = MirrorSettingsSchema.safeParse(raw);
  if (!result.success) {
    throw new InvalidArgumentError(
      "settings",
      `Invalid ${source}: ${formatIssues(result.error)}`,
    );
  }
  return result.data;
}

/**
 * Loads the settings file.
 *
 * An explicit path (argument or HELPMIRROR_CONFIG) must exist; the default
 * `helpmirror.json` in the working directory is optional.
 */
export async function loadSettings(
  explicitPath?: string,
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd(),
): Promise<MirrorSettings> {
  const requested = explicitPath ?? env[ENV_KEYS.HELPMIRROR_CONFIG];
  const filePath = path.resolve(cwd, requested ?? DEFAULT_SETTINGS_FILE);

  let content: string;
  try {
    content = await readFile(filePath, "utf-8");
  } catch (error) {
    if (errnoCode(error) === "ENOENT" && !requested) {
      return parseSettings({});
    }
    const detail = error instanceof Error ? error.message : String(error);
    throw new InvalidArgumentError(
      "settings",
      `Cannot read settings file '${filePath}': ${detail}`,
    );
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new InvalidArgumentError(
      "settings",
      `Settings file '${filePath}' is not valid JSON: ${detail}`,
    );
  }

  return parseSettings(raw, `settings file '${filePath}'`);
}

/**
 * Cache directory from, in order: flag, environment, settings, default
 */
export function resolveCacheDirectory(
  settings: MirrorSettings,
  flag?: string,
  env: NodeJS.ProcessEnv = process.env,
): string {
  const chosen =
    flag ??
    env[ENV_KEYS.HELPMIRROR_CACHE_DIR] ??
    settings.cacheDirectory ??
    path.join(os.homedir(), "Downloads", "MSDN Library");
  return path.resolve(chosen);
}

/**
 * Log directory from flag, environment or settings; undefined logs to console only
 */
export function resolveLogDirectory(
  settings: MirrorSettings,
  flag?: string,
  env: NodeJS.ProcessEnv = process.env,
): string | undefined {
  const chosen = flag ?? env[ENV_KEYS.HELPMIRROR_LOG_DIR] ?? settings.logDirectory;
  return chosen ? path.resolve(chosen) : undefined;
}

/**
 * Datasafe configuration.
 * Environment variables validated with zod, with defaults for a local setup.
 */

import { z } from 'zod';
import { ConfigurationError } from './errors.js';

export const DEFAULT_ROOT_DIRECTORY = 'datasafe_root';
export const DEFAULT_MANIFEST_FILENAME = 'MANIFEST.yaml';
export const DEFAULT_CHECKSUM_ALGORITHM = 'md5';
export const DEFAULT_PORT = 8000;

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

const EnvSchema = z.object({
  DATASAFE_ROOT: z.string().min(1).default(DEFAULT_ROOT_DIRECTORY),
  DATASAFE_MANIFEST_FILENAME: z
    .string()
    .min(1)
    .refine(name => !name.includes('/') && !name.includes('\\'), 'must be a plain file name')
    .default(DEFAULT_MANIFEST_FILENAME),
  DATASAFE_CHECKSUM_ALGORITHM: z.string().min(1).default(DEFAULT_CHECKSUM_ALGORITHM),
  DATASAFE_PORT: z.coerce.number().int().min(0).max(65535).default(DEFAULT_PORT),
  DATASAFE_URL: z.string().url().optional(),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
});

export interface DatasafeConfig {
  /** Storage backend root directory */
  rootDirectory: string;
  /** Name of the manifest file accompanying every dataset */
  manifestFilename: string;
  /** Digest used when writing new manifests */
  checksumAlgorithm: string;
  /** HTTP server port */
  port: number;
  /** Server the HTTP client talks to with `--remote` */
  serverUrl: string;
  logLevel: LogLevel;
}

/**
 * Read configuration from the environment.
 *
 * @throws {ConfigurationError} naming the first offending variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Readonly<DatasafeConfig> {
  // Empty strings count as unset
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== '')
  );
  const result = EnvSchema.safeParse(present);
  if (!result.success) {
    const issue = result.error.issues[0];
    const variable = issue.path.join('.');
    throw new ConfigurationError(`Invalid ${variable}: ${issue.message}`, { variable });
  }

  const parsed = result.data;
  return Object.freeze({
    rootDirectory: parsed.DATASAFE_ROOT,
    manifestFilename: parsed.DATASAFE_MANIFEST_FILENAME,
    checksumAlgorithm: parsed.DATASAFE_CHECKSUM_ALGORITHM,
    port: parsed.DATASAFE_PORT,
    serverUrl: parsed.DATASAFE_URL ?? `http://127.0.0.1:${parsed.DATASAFE_PORT}`,
    logLevel: parsed.LOG_LEVEL,
  });
}

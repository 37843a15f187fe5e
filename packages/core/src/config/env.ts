/**
 * Environment Configuration
 *
 * Settings that are not command-line flags: package naming, which
 * archiver to use, external binary paths and object storage access.
 * `.env` in the working directory is loaded first; real environment
 * variables win over it.
 */

import { config as dotenvConfig } from 'dotenv';
import { resolve } from 'node:path';
import { z } from 'zod';
import { ValidationError } from '../errors/index.js';

const booleanString = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),

  // Packaging
  RELPACK_PACKAGE_NAME: z
    .string()
    .regex(/^[A-Za-z0-9][A-Za-z0-9._-]*$/, 'must be a plain file name')
    .default('rhs-hadoop-install'),
  RELPACK_UTILITY_DIR: z.string().min(1).default('bin/'),
  RELPACK_ARCHIVER: z.enum(['system', 'builtin']).default('system'),
  RELPACK_COMMAND_TIMEOUT_MS: z.string().regex(/^\d+$/, 'must be a number of milliseconds').transform(Number).default('300000'),

  // External tools
  GIT_PATH: z.string().min(1).default('git'),
  TAR_PATH: z.string().min(1).default('tar'),
  SOFFICE_PATH: z.string().min(1).default('soffice'),

  // Object storage (publish)
  MINIO_ENDPOINT: z.string().min(1).optional(),
  MINIO_PORT: z.string().regex(/^\d+$/, 'must be a port number').transform(Number).default('9000'),
  MINIO_USE_SSL: booleanString.default('false'),
  MINIO_ACCESS_KEY: z.string().min(1).optional(),
  MINIO_SECRET_KEY: z.string().min(1).optional(),
  MINIO_BUCKET: z.string().min(1).optional(),
});

export type RelpackEnv = z.infer<typeof envSchema>;

export interface RelpackSettings {
  nodeEnv: RelpackEnv['NODE_ENV'];
  logLevel: RelpackEnv['LOG_LEVEL'];
  packaging: {
    packageName: string;
    utilityDir: string;
    archiver: RelpackEnv['RELPACK_ARCHIVER'];
    commandTimeoutMs: number;
  };
  binaries: {
    git: string;
    tar: string;
    soffice: string;
  };
  storage: {
    endPoint?: string;
    port: number;
    useSSL: boolean;
    accessKey?: string;
    secretKey?: string;
    bucket?: string;
  };
}

/**
 * Load `.env` from a directory without overriding variables already set
 */
export function loadDotenv(dir: string = process.cwd()): void {
  dotenvConfig({ path: resolve(dir, '.env') });
}

/**
 * Parse settings from an environment map
 *
 * @throws ValidationError naming the first offending variable
 */
export function parseSettings(env: NodeJS.ProcessEnv = process.env): RelpackSettings {
  const parseResult = envSchema.safeParse(env);

  if (!parseResult.success) {
    const issue = parseResult.error.issues[0];
    const field = issue?.path.join('.') || 'environment';
    throw new ValidationError(field, issue?.message ?? 'invalid value');
  }

  const parsed = parseResult.data;

  return {
    nodeEnv: parsed.NODE_ENV,
    logLevel: parsed.LOG_LEVEL,
    packaging: {
      packageName: parsed.RELPACK_PACKAGE_NAME,
      utilityDir: parsed.RELPACK_UTILITY_DIR,
      archiver: parsed.RELPACK_ARCHIVER,
      commandTimeoutMs: parsed.RELPACK_COMMAND_TIMEOUT_MS,
    },
    binaries: {
      git: parsed.GIT_PATH,
      tar: parsed.TAR_PATH,
      soffice: parsed.SOFFICE_PATH,
    },
    storage: {
      endPoint: parsed.MINIO_ENDPOINT,
      port: parsed.MINIO_PORT,
      useSSL: parsed.MINIO_USE_SSL,
      accessKey: parsed.MINIO_ACCESS_KEY,
      secretKey: parsed.MINIO_SECRET_KEY,
      bucket: parsed.MINIO_BUCKET,
    },
  };
}

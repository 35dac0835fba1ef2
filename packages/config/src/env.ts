import { DEFAULT_VERSION_HEADER, DEFAULT_VERSION_QUERY_PARAM, VERSION_FORMATS, type StrategyOptions, type VersioningOptions } from '@versionkit/core';
import { z } from 'zod';
import { parseVersioningConfig } from './versioning.js';

function emptyStringToUndefined(value: unknown): unknown {
  if (typeof value === 'string' && value.trim().length === 0) {
    return undefined;
  }
  return value;
}

const optionalNonEmptyString = z.preprocess(emptyStringToUndefined, z.string().min(1).optional());

const boolFromString = z
  .enum(['true', 'false'])
  .default('false')
  .transform((value) => value === 'true');

const commaList = z.preprocess(
  emptyStringToUndefined,
  z
    .string()
    .optional()
    .transform((value) =>
      (value ?? '')
        .split(',')
        .map((entry) => entry.trim())
        .filter((entry) => entry.length > 0)
    )
);

const ENV_STRATEGY_KINDS = ['url_path', 'header', 'query_param', 'accept_header'] as const;

const compatibilityJson = z.preprocess(
  emptyStringToUndefined,
  z
    .string()
    .optional()
    .transform((value, context): unknown => {
      if (value === undefined) return {};
      try {
        return JSON.parse(value);
      } catch {
        context.addIssue({ code: z.ZodIssueCode.custom, message: 'API_COMPATIBILITY must be valid JSON.' });
        return z.NEVER;
      }
    })
    .pipe(z.record(z.string(), z.array(z.string())))
);

const versioningEnvSchema = z.object({
  API_VERSION_FORMAT: z.enum(VERSION_FORMATS).default('semantic'),
  API_VERSION_STRATEGIES: z
    .string()
    .default('url_path,header')
    .transform((value) =>
      value
        .split(',')
        .map((entry) => entry.trim())
        .filter((entry) => entry.length > 0)
    )
    .pipe(z.array(z.enum(ENV_STRATEGY_KINDS)).min(1, 'API_VERSION_STRATEGIES must name at least one strategy.')),
  API_VERSION_HEADER: z.string().min(1).default(DEFAULT_VERSION_HEADER),
  API_VERSION_HEADER_ALTERNATIVES: commaList,
  API_VERSION_QUERY_PARAM: z.string().min(1).default(DEFAULT_VERSION_QUERY_PARAM),
  API_VERSION_URL_PREFIX: z.string().default('v'),
  API_VERSION_API_PREFIX: optionalNonEmptyString,
  API_VERSION_ACCEPT_VENDOR: boolFromString,
  API_DEFAULT_VERSION: optionalNonEmptyString,
  API_STRICT_VERSIONING: boolFromString,
  API_COMPATIBILITY: compatibilityJson
});

export type VersioningEnv = z.infer<typeof versioningEnvSchema>;

export function loadVersioningEnv(input: NodeJS.ProcessEnv = process.env): VersioningEnv {
  return versioningEnvSchema.parse(input);
}

function strategyFromEnv(kind: (typeof ENV_STRATEGY_KINDS)[number], priority: number, env: VersioningEnv): StrategyOptions {
  switch (kind) {
    case 'url_path':
      return { kind, priority, prefix: env.API_VERSION_URL_PREFIX, apiPrefix: env.API_VERSION_API_PREFIX };
    case 'header':
      return { kind, priority, header: env.API_VERSION_HEADER, alternatives: env.API_VERSION_HEADER_ALTERNATIVES };
    case 'query_param':
      return { kind, priority, param: env.API_VERSION_QUERY_PARAM };
    case 'accept_header':
      return { kind, priority, vendorPattern: env.API_VERSION_ACCEPT_VENDOR };
  }
}

/** Strategy order in API_VERSION_STRATEGIES becomes priority order. */
export function versioningOptionsFromEnv(env: VersioningEnv): VersioningOptions {
  return parseVersioningConfig({
    format: env.API_VERSION_FORMAT,
    strategies: env.API_VERSION_STRATEGIES.map((kind, index) => strategyFromEnv(kind, (index + 1) * 10, env)),
    defaultVersion: env.API_DEFAULT_VERSION ?? null,
    strictVersioning: env.API_STRICT_VERSIONING,
    compatibility: env.API_COMPATIBILITY
  });
}

export function loadVersioningOptions(input: NodeJS.ProcessEnv = process.env): VersioningOptions {
  return versioningOptionsFromEnv(loadVersioningEnv(input));
}

import {
  VERSION_FORMATS,
  Version,
  type StrategyOptions,
  type VersionFormat,
  type VersioningOptions
} from '@versionkit/core';
import { z } from 'zod';

const strategyBase = {
  name: z.string().min(1).optional(),
  priority: z.number().int().optional(),
  enabled: z.boolean().optional()
};

function isRegExpSource(value: string): boolean {
  try {
    new RegExp(value);
    return true;
  } catch {
    return false;
  }
}

const headerName = z.string().regex(/^[A-Za-z0-9!#$%&'*+.^_`|~-]+$/, 'Invalid header name.');

export const strategyConfigSchema: z.ZodType<StrategyOptions, z.ZodTypeDef, unknown> = z.lazy(() =>
  z.discriminatedUnion('kind', [
    z
      .object({
        ...strategyBase,
        kind: z.literal('url_path'),
        prefix: z.string().regex(/^[A-Za-z_-]*$/, 'URL prefix may only contain letters, "_" and "-".').optional(),
        apiPrefix: z.string().optional()
      })
      .strict(),
    z
      .object({
        ...strategyBase,
        kind: z.literal('header'),
        header: headerName.optional(),
        alternatives: z.array(headerName).optional(),
        field: z.string().min(1).optional()
      })
      .strict(),
    z
      .object({
        ...strategyBase,
        kind: z.literal('query_param'),
        param: z.string().min(1).optional(),
        alternatives: z.array(z.string().min(1)).optional(),
        caseSensitive: z.boolean().optional()
      })
      .strict(),
    z
      .object({
        ...strategyBase,
        kind: z.literal('accept_header'),
        parameter: z.string().min(1).optional(),
        mediaType: z.string().min(1).optional(),
        vendorPattern: z
          .union([z.boolean(), z.string().min(1).refine(isRegExpSource, 'vendorPattern must be a valid regular expression.')])
          .optional()
      })
      .strict(),
    z
      .object({
        ...strategyBase,
        kind: z.literal('composite'),
        strategies: z.array(strategyConfigSchema).min(1)
      })
      .strict()
  ])
);

const deprecationHeadersSchema = z
  .object({
    deprecation: headerName.optional(),
    sunset: headerName.optional(),
    link: headerName.optional(),
    warning: headerName.optional()
  })
  .strict();

function checkVersion(
  raw: string,
  format: VersionFormat,
  path: (string | number)[],
  context: z.RefinementCtx
): void {
  if (!Version.isValid(raw, format)) {
    context.addIssue({
      code: z.ZodIssueCode.custom,
      path,
      message: `'${raw}' is not a valid ${format} version.`
    });
  }
}

export const versioningConfigSchema = z
  .object({
    format: z.enum(VERSION_FORMATS).default('semantic'),
    strategies: z.array(strategyConfigSchema).min(1).default([{ kind: 'url_path' }]),
    defaultVersion: z.string().min(1).nullable().default(null),
    strictVersioning: z.boolean().default(false),
    compatibility: z.record(z.string(), z.array(z.string().min(1))).default({}),
    deprecationHeaders: deprecationHeadersSchema.default({})
  })
  .strict()
  .superRefine((value, context) => {
    if (value.defaultVersion !== null) {
      checkVersion(value.defaultVersion, value.format, ['defaultVersion'], context);
    }

    for (const [version, fallbacks] of Object.entries(value.compatibility)) {
      checkVersion(version, value.format, ['compatibility', version], context);
      fallbacks.forEach((fallback, index) => {
        checkVersion(fallback, value.format, ['compatibility', version, index], context);
      });
    }
  });

export type VersioningConfig = z.infer<typeof versioningConfigSchema>;

/** Validates a structured configuration object, e.g. one read from a JSON file. */
export function parseVersioningConfig(input: unknown): VersioningOptions {
  return versioningConfigSchema.parse(input);
}

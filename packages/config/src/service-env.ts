import { z } from 'zod';

const boolFromString = z
  .enum(['true', 'false'])
  .default('false')
  .transform((value) => value === 'true');

const accountsApiSchema = z.object({
  ACCOUNTS_API_HOST: z.string().min(1).default('0.0.0.0'),
  ACCOUNTS_API_PORT: z.coerce.number().int().min(1).max(65_535).default(3000),
  API_ENFORCE_SUNSET: boolFromString,
  API_DISCOVERY_PATH: z.string().regex(/^\/\S*$/, 'API_DISCOVERY_PATH must start with "/".').default('/versions'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).optional()
});

export type AccountsApiServiceEnv = z.infer<typeof accountsApiSchema>;

export function loadAccountsApiServiceEnv(input: NodeJS.ProcessEnv = process.env): AccountsApiServiceEnv {
  return accountsApiSchema.parse(input);
}

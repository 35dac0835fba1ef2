import { loadAccountsApiServiceEnv, loadVersioningOptions } from '@versionkit/config';
import { runServiceAndExit } from '@versionkit/http';
import { buildAccountsApiApp } from './app.js';

const env = loadAccountsApiServiceEnv();

runServiceAndExit({
  serviceName: 'accounts-api',
  port: env.ACCOUNTS_API_PORT,
  host: env.ACCOUNTS_API_HOST,
  buildApp: () => buildAccountsApiApp({ versioning: loadVersioningOptions(), env })
});

export interface AppConfig {
  apiBaseUrl: string;
  correlationsBaseUrl: string;
  crashPingsBaseUrl: string;
  tokenPath?: string | undefined;
}

export const DEFAULT_API_URL = 'https://crash-stats.mozilla.org/api';
export const DEFAULT_CORRELATIONS_URL =
  'https://analysis-output.telemetry.mozilla.org/top-signatures-correlations/data';
export const DEFAULT_PINGS_URL = 'https://crash-pings.mozilla.org';

export function getConfig(): AppConfig {
  return {
    apiBaseUrl: stripTrailingSlash(process.env.CRASHSTATS_API_URL || DEFAULT_API_URL),
    correlationsBaseUrl: stripTrailingSlash(process.env.CRASHSTATS_CORRELATIONS_URL || DEFAULT_CORRELATIONS_URL),
    crashPingsBaseUrl: stripTrailingSlash(process.env.CRASHSTATS_PINGS_URL || DEFAULT_PINGS_URL),
    tokenPath: getEnvVar('SOCORRO_API_TOKEN_PATH'),
  };
}

function stripTrailingSlash(url: string): string {
  return url.replace(/\/+$/, '');
}

export function getEnvVar(name: string, defaultValue?: string): string | undefined {
  return process.env[name] || defaultValue;
}

/**
 * CLI configuration: server URL from --url, DIGESTBENCH_URL or the default.
 */

export const DEFAULT_SERVER_URL = 'http://localhost:5000';

export interface CliConfig {
  url: string;
}

export function loadConfig(urlOverride?: string, env: NodeJS.ProcessEnv = process.env): CliConfig {
  const url = urlOverride || env['DIGESTBENCH_URL'] || DEFAULT_SERVER_URL;
  return { url: url.replace(/\/+$/, '') };
}

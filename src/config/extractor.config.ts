import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { registerAs } from '@nestjs/config';
import { ConfigurationError } from '../common/errors';

export const EXTRACTOR_CONFIG_NAMESPACE = 'extractor';
export const DEFAULT_CONFIG_PATH = 'config/extractor.json';

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Read the JSON configuration file and apply environment overrides.
 *
 * EXTRACTOR_CONFIG selects the file; METEOBLUE_API_KEY and METEOBLUE_API_URL
 * take precedence over the file's apiKey/apiUrl so the key can stay out of it.
 */
export function loadExtractorConfig(
  env: NodeJS.ProcessEnv = process.env,
): Record<string, unknown> {
  const configPath = resolve(env.EXTRACTOR_CONFIG || DEFAULT_CONFIG_PATH);

  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(configPath, 'utf-8'));
  } catch (error) {
    throw new ConfigurationError(
      `Cannot read configuration file ${configPath}: ${error instanceof Error ? error.message : String(error)}`,
    );
  }

  if (!isPlainObject(parsed)) {
    throw new ConfigurationError(
      `Configuration file ${configPath} must contain a JSON object`,
    );
  }

  const config: Record<string, unknown> = { ...parsed };
  if (env.METEOBLUE_API_KEY) config.apiKey = env.METEOBLUE_API_KEY;
  if (env.METEOBLUE_API_URL) config.apiUrl = env.METEOBLUE_API_URL;
  return config;
}

export default registerAs(EXTRACTOR_CONFIG_NAMESPACE, () =>
  loadExtractorConfig(),
);

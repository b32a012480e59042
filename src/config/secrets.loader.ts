import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { parse } from '@iarna/toml';
import { validateSecrets, type GeminiSecrets } from './secrets.validation';

export const DEFAULT_SECRETS_PATH = 'config/secrets.toml';

export type AppSecrets = {
  gemini: GeminiSecrets;
};

/**
 * Reads the TOML secrets file. A missing file yields an empty table so the
 * platform secret store (environment variables) can supply everything.
 */
export function readSecretsFile(path: string): Record<string, unknown> {
  let content: string;
  try {
    content = readFileSync(resolve(path), 'utf-8');
  } catch (error) {
    if (isFileNotFound(error)) return {};
    throw error;
  }
  return parse(content);
}

// fs errors may come from another realm (Jest), so no instanceof Error here.
function isFileNotFound(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    error.code === 'ENOENT'
  );
}

function isTable(value: unknown): value is Record<string, unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    !(value instanceof Date)
  );
}

function tableValue(table: unknown, key: string): unknown {
  return isTable(table) ? table[key] : undefined;
}

/** An empty environment variable counts as unset. */
function fromEnv(value: string | undefined): string | undefined {
  return value === '' ? undefined : value;
}

/**
 * Loader for `ConfigModule.forRoot({ load })`. Environment variables win
 * over the file; every value is required.
 */
export function loadSecrets(env: NodeJS.ProcessEnv = process.env): AppSecrets {
  const file = readSecretsFile(env.SECRETS_PATH ?? DEFAULT_SECRETS_PATH);
  const gemini = file.gemini;

  return {
    gemini: validateSecrets({
      apiKey: fromEnv(env.GEMINI_API_KEY) ?? tableValue(gemini, 'api_key'),
      filestoreId:
        fromEnv(env.GEMINI_FILESTORE_ID) ?? tableValue(gemini, 'filestore_id'),
      projectId:
        fromEnv(env.GEMINI_PROJECT_ID) ?? tableValue(gemini, 'project_id'),
    }),
  };
}

export default () => loadSecrets();

import path from 'node:path';
import { isLogLevel, type LogLevel } from './logging';
import { DEFAULT_TEXTURE_NAMES } from './domain/params/defaults';
import { DEFAULT_RENORMAL_MARKER } from './domain/validation/renormalFindings';

export const APP_ID = 'ssbh-check';
export const APP_VERSION = '0.1.0';
export const PRESETS_FILE_NAME = 'presets.json';
export const SHADER_DATABASE_FILE_NAME = 'shaders.json';

export interface RuntimeConfig {
  logLevel: LogLevel;
  dataDir: string;
  shaderDatabasePath: string;
  presetsPath: string;
  renormalMarker: string;
  defaultTextureNames: readonly string[];
}

const nonEmpty = (value: string | undefined): string | null => {
  const trimmed = String(value ?? '').trim();
  return trimmed ? trimmed : null;
};

const parseLogLevel = (value: string | undefined, fallback: LogLevel): LogLevel => {
  const normalized = String(value ?? '').trim().toLowerCase();
  return isLogLevel(normalized) ? normalized : fallback;
};

const parseList = (value: string | undefined): string[] | null => {
  const raw = nonEmpty(value);
  if (!raw) return null;
  const items = raw
    .split(',')
    .map((item) => item.trim())
    .filter(Boolean);
  return items.length > 0 ? items : null;
};

/**
 * Resolves settings from the environment. Relative paths resolve against the
 * data directory, which defaults to `.ssbh-check` under the working directory.
 */
export const resolveRuntimeConfig = (env: NodeJS.ProcessEnv, cwd: string = process.cwd()): RuntimeConfig => {
  const dataDir = path.resolve(cwd, nonEmpty(env.SSBH_CHECK_DATA_DIR) ?? `.${APP_ID}`);
  const inDataDir = (value: string | null, fallback: string): string => path.resolve(dataDir, value ?? fallback);
  return {
    logLevel: parseLogLevel(env.SSBH_CHECK_LOG_LEVEL, 'info'),
    dataDir,
    shaderDatabasePath: inDataDir(nonEmpty(env.SSBH_CHECK_SHADER_DATABASE), SHADER_DATABASE_FILE_NAME),
    presetsPath: inDataDir(nonEmpty(env.SSBH_CHECK_PRESETS_PATH), PRESETS_FILE_NAME),
    renormalMarker: nonEmpty(env.SSBH_CHECK_RENORMAL_MARKER) ?? DEFAULT_RENORMAL_MARKER,
    defaultTextureNames: parseList(env.SSBH_CHECK_DEFAULT_TEXTURES) ?? DEFAULT_TEXTURE_NAMES
  };
};

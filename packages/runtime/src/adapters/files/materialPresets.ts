import fs from 'node:fs';
import path from 'node:path';
import type { MatlData, MatlEntry } from '@ssbh-check/contracts/types/internal';
import { errorMessage, type Logger } from '../../logging';
import { parseMatlData } from '../../domain/material/parse';
import { defaultPresets } from '../../domain/material/presets';
import { PRESETS_LOAD_FAILED, PRESETS_WRITE_FAILED } from '../../shared/messages/material';

export interface MaterialPresetsDeps {
  logger: Logger;
}

const writeDefaultPresets = (filePath: string, deps: MaterialPresetsDeps): void => {
  const document: MatlData = { majorVersion: 1, minorVersion: 6, entries: defaultPresets() };
  try {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, `${JSON.stringify(document, null, 2)}\n`, 'utf8');
  } catch (err) {
    deps.logger.error(PRESETS_WRITE_FAILED(filePath), { reason: errorMessage(err) });
  }
};

/**
 * Reads the user's material presets, seeding the file with the bundled
 * presets on first use. Any failure falls back to the bundled presets.
 */
export const loadMaterialPresets = (filePath: string, deps: MaterialPresetsDeps): MatlEntry[] => {
  if (!fs.existsSync(filePath)) writeDefaultPresets(filePath, deps);
  try {
    const parsed = parseMatlData(JSON.parse(fs.readFileSync(filePath, 'utf8')));
    if (parsed.ok) return parsed.data.entries;
    deps.logger.error(PRESETS_LOAD_FAILED(filePath), { reason: parsed.error.message });
  } catch (err) {
    deps.logger.error(PRESETS_LOAD_FAILED(filePath), { reason: errorMessage(err) });
  }
  return defaultPresets();
};

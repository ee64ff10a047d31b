import fs from 'node:fs';
import { errorMessage } from '../../logging';
import { parseShaderDatabase, type ShaderDatabase } from '../../domain/shader/database';
import { fail, type DomainResult } from '../../domain/result';
import { SHADER_DATABASE_PARSE_FAILED, SHADER_DATABASE_READ_FAILED } from '../../shared/messages/shader';

const readJson = (filePath: string): DomainResult<unknown> => {
  let raw: string;
  try {
    raw = fs.readFileSync(filePath, 'utf8');
  } catch (err) {
    return fail('io_error', SHADER_DATABASE_READ_FAILED(filePath, errorMessage(err)), { filePath });
  }
  try {
    return { ok: true, data: JSON.parse(raw) };
  } catch (err) {
    return fail('invalid_payload', SHADER_DATABASE_PARSE_FAILED(filePath, errorMessage(err)), { filePath });
  }
};

export const loadShaderDatabase = (filePath: string): DomainResult<ShaderDatabase> => {
  const json = readJson(filePath);
  if (!json.ok) return json;
  const parsed = parseShaderDatabase(json.data);
  if (!parsed.ok) {
    return fail(parsed.error.code, parsed.error.message, { ...parsed.error.details, filePath });
  }
  return parsed;
};

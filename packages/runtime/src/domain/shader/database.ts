import type { ShaderProgram, ShaderProgramRecord } from '@ssbh-check/contracts/types/internal';
import type { ShaderProgramLookup } from '../../ports/shaderDatabase';
import { isRecord, isStringArray } from '../guards';
import { fail, ok, type DomainResult } from '../result';
import {
  SHADER_DATABASE_NOT_OBJECT,
  SHADER_DATABASE_PROGRAMS_MISSING,
  SHADER_PROGRAM_INVALID
} from '../../shared/messages/shader';

export class ShaderDatabase implements ShaderProgramLookup {
  private readonly programs = new Map<string, ShaderProgram>();

  constructor(records: readonly ShaderProgramRecord[] = []) {
    records.forEach((record) => this.add(record));
  }

  add(record: ShaderProgramRecord): void {
    this.programs.set(record.name, {
      materialParameters: [...record.materialParameters],
      vertexAttributes: [...record.vertexAttributes],
      discard: record.discard
    });
  }

  get(programName: string): ShaderProgram | undefined {
    return this.programs.get(programName);
  }

  get size(): number {
    return this.programs.size;
  }

  names(): string[] {
    return [...this.programs.keys()].sort();
  }
}

const parseProgramRecord = (value: unknown, index: number): DomainResult<ShaderProgramRecord> => {
  if (
    !isRecord(value) ||
    typeof value.name !== 'string' ||
    !isStringArray(value.materialParameters) ||
    !isStringArray(value.vertexAttributes)
  ) {
    return fail('invalid_payload', SHADER_PROGRAM_INVALID(index), { index });
  }
  return ok({
    name: value.name,
    materialParameters: value.materialParameters,
    vertexAttributes: value.vertexAttributes,
    discard: value.discard === true
  });
};

/**
 * Builds a database from the decoded JSON document `{ programs: [...] }`.
 * The first malformed program rejects the whole document.
 */
export const parseShaderDatabase = (value: unknown): DomainResult<ShaderDatabase> => {
  if (!isRecord(value)) return fail('invalid_payload', SHADER_DATABASE_NOT_OBJECT);
  const programs = value.programs;
  if (!Array.isArray(programs)) return fail('invalid_payload', SHADER_DATABASE_PROGRAMS_MISSING);
  const records: ShaderProgramRecord[] = [];
  for (let i = 0; i < programs.length; i += 1) {
    const parsed = parseProgramRecord(programs[i], i);
    if (!parsed.ok) return parsed;
    records.push(parsed.data);
  }
  return ok(new ShaderDatabase(records));
};

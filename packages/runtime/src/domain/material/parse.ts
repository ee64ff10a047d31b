import {
  BLEND_FACTORS,
  CULL_MODES,
  FILL_MODES,
  MAG_FILTERS,
  MAX_ANISOTROPY,
  MIN_FILTERS,
  WRAP_MODES
} from '@ssbh-check/contracts/schema/constants';
import type {
  BlendStateData,
  MatlData,
  MatlEntry,
  Param,
  RasterizerStateData,
  SamplerData,
  Vector4
} from '@ssbh-check/contracts/types/internal';
import { isFiniteNumber, isRecord } from '../guards';
import { fail, ok, type DomainResult } from '../result';
import { MATL_DOCUMENT_INVALID, MATL_ENTRY_INVALID } from '../../shared/messages/material';

const oneOf =
  <T extends string>(values: readonly T[]) =>
  (value: unknown): value is T =>
    typeof value === 'string' && values.some((candidate) => candidate === value);

const isWrapMode = oneOf(WRAP_MODES);
const isMinFilter = oneOf(MIN_FILTERS);
const isMagFilter = oneOf(MAG_FILTERS);
const isMaxAnisotropy = oneOf(MAX_ANISOTROPY);
const isBlendFactor = oneOf(BLEND_FACTORS);
const isFillMode = oneOf(FILL_MODES);
const isCullMode = oneOf(CULL_MODES);

const readVector4 = (value: unknown): Vector4 | null => {
  if (!Array.isArray(value) || value.length !== 4) return null;
  const [x, y, z, w] = value;
  if (!isFiniteNumber(x) || !isFiniteNumber(y) || !isFiniteNumber(z) || !isFiniteNumber(w)) return null;
  return [x, y, z, w];
};

const readBoolean = (value: unknown): boolean | null => (typeof value === 'boolean' ? value : null);
const readFloat = (value: unknown): number | null => (isFiniteNumber(value) ? value : null);
const readString = (value: unknown): string | null => (typeof value === 'string' ? value : null);

const readSampler = (value: unknown): SamplerData | null => {
  if (!isRecord(value)) return null;
  const borderColor = readVector4(value.borderColor);
  const rawAnisotropy = value.maxAnisotropy ?? null;
  const maxAnisotropy = isMaxAnisotropy(rawAnisotropy) ? rawAnisotropy : null;
  if (
    !isWrapMode(value.wraps) ||
    !isWrapMode(value.wrapt) ||
    !isWrapMode(value.wrapr) ||
    !isMinFilter(value.minFilter) ||
    !isMagFilter(value.magFilter) ||
    !borderColor ||
    !isFiniteNumber(value.lodBias) ||
    (rawAnisotropy !== null && maxAnisotropy === null)
  ) {
    return null;
  }
  return {
    wraps: value.wraps,
    wrapt: value.wrapt,
    wrapr: value.wrapr,
    minFilter: value.minFilter,
    magFilter: value.magFilter,
    borderColor,
    lodBias: value.lodBias,
    maxAnisotropy
  };
};

const readBlendState = (value: unknown): BlendStateData | null => {
  if (!isRecord(value)) return null;
  if (
    !isBlendFactor(value.sourceColor) ||
    !isBlendFactor(value.destinationColor) ||
    typeof value.alphaSampleToCoverage !== 'boolean'
  ) {
    return null;
  }
  return {
    sourceColor: value.sourceColor,
    destinationColor: value.destinationColor,
    alphaSampleToCoverage: value.alphaSampleToCoverage
  };
};

const readRasterizerState = (value: unknown): RasterizerStateData | null => {
  if (!isRecord(value)) return null;
  if (!isFillMode(value.fillMode) || !isCullMode(value.cullMode) || !isFiniteNumber(value.depthBias)) return null;
  return { fillMode: value.fillMode, cullMode: value.cullMode, depthBias: value.depthBias };
};

const readParams = <T>(value: unknown, readData: (data: unknown) => T | null): Param<T>[] | null => {
  if (!Array.isArray(value)) return null;
  const params: Param<T>[] = [];
  for (const item of value) {
    if (!isRecord(item) || typeof item.paramId !== 'string') return null;
    const data = readData(item.data);
    if (data === null) return null;
    params.push({ paramId: item.paramId, data });
  }
  return params;
};

export const parseMatlEntry = (value: unknown): MatlEntry | null => {
  if (!isRecord(value)) return null;
  if (typeof value.materialLabel !== 'string' || typeof value.shaderLabel !== 'string') return null;
  const booleans = readParams(value.booleans, readBoolean);
  const floats = readParams(value.floats, readFloat);
  const vectors = readParams(value.vectors, readVector4);
  const textures = readParams(value.textures, readString);
  const samplers = readParams(value.samplers, readSampler);
  const blendStates = readParams(value.blendStates, readBlendState);
  const rasterizerStates = readParams(value.rasterizerStates, readRasterizerState);
  if (!booleans || !floats || !vectors || !textures || !samplers || !blendStates || !rasterizerStates) return null;
  return {
    materialLabel: value.materialLabel,
    shaderLabel: value.shaderLabel,
    booleans,
    floats,
    vectors,
    textures,
    samplers,
    blendStates,
    rasterizerStates
  };
};

/** Decodes the JSON form of a material file, `{ majorVersion, minorVersion, entries }`. */
export const parseMatlData = (value: unknown): DomainResult<MatlData> => {
  if (!isRecord(value) || !Array.isArray(value.entries)) return fail('invalid_payload', MATL_DOCUMENT_INVALID);
  const entries: MatlEntry[] = [];
  for (let i = 0; i < value.entries.length; i += 1) {
    const entry = parseMatlEntry(value.entries[i]);
    if (!entry) return fail('invalid_payload', MATL_ENTRY_INVALID(i), { index: i });
    entries.push(entry);
  }
  return ok({
    majorVersion: isFiniteNumber(value.majorVersion) ? value.majorVersion : 1,
    minorVersion: isFiniteNumber(value.minorVersion) ? value.minorVersion : 6,
    entries
  });
};

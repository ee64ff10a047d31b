import type { ParamId, ParamKind } from '@ssbh-check/contracts/types/internal';
import paramTable from './paramTable.json';

const PARAM_FAMILIES: Array<{ pattern: RegExp; kind: ParamKind }> = [
  { pattern: /^CustomBoolean\d+$/, kind: 'boolean' },
  { pattern: /^CustomFloat\d+$/, kind: 'float' },
  { pattern: /^CustomVector\d+$/, kind: 'vector4' },
  { pattern: /^Texture\d+$/, kind: 'texture' },
  { pattern: /^Sampler\d+$/, kind: 'sampler' },
  { pattern: /^BlendState\d+$/, kind: 'blend_state' },
  { pattern: /^RasterizerState\d+$/, kind: 'rasterizer_state' }
];

const familyOf = (name: string): ParamKind => PARAM_FAMILIES.find((f) => f.pattern.test(name))?.kind ?? 'other';

const PARAM_CODES = new Map<ParamId, number>(Object.entries(paramTable.params));
const PARAM_KINDS = new Map<ParamId, ParamKind>([...PARAM_CODES.keys()].map((name) => [name, familyOf(name)]));
const UNKNOWN_PARAM_CODE = Math.max(...PARAM_CODES.values()) + 1;

export const isParamId = (value: string): boolean => PARAM_CODES.has(value);

export const paramKind = (id: ParamId): ParamKind => PARAM_KINDS.get(id) ?? 'other';

export const paramCode = (id: ParamId): number => PARAM_CODES.get(id) ?? UNKNOWN_PARAM_CODE;

export const compareParamIds = (a: ParamId, b: ParamId): number => paramCode(a) - paramCode(b);

export const listParamIds = (kind?: ParamKind): ParamId[] =>
  [...PARAM_CODES.keys()]
    .filter((id) => kind === undefined || paramKind(id) === kind)
    .sort(compareParamIds);

// Slots sampled as colour data. Normal maps, PRM maps and the two lighting
// cube maps hold linear values.
const LINEAR_TEXTURES = new Set<ParamId>(['Texture2', 'Texture4', 'Texture6', 'Texture7', 'Texture16']);

export const expectsSrgb = (id: ParamId): boolean => !LINEAR_TEXTURES.has(id);

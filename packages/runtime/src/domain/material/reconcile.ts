import type { ChannelMask, MatlEntry, Param, ParamId, ShaderProgram } from '@ssbh-check/contracts/types/internal';
import { compareParamIds, paramKind } from '../params/classify';
import {
  defaultBlendState,
  defaultRasterizerState,
  defaultSampler,
  defaultTexture,
  zeroVector
} from '../params/defaults';
import { accessedChannels, declaredParamNames, declaresParam } from '../shader/program';

type ParamListKey = Exclude<keyof MatlEntry, 'materialLabel' | 'shaderLabel'>;

// Iteration order for "every parameter of an entry".
const PARAM_LIST_KEYS: ParamListKey[] = [
  'booleans',
  'floats',
  'vectors',
  'textures',
  'samplers',
  'blendStates',
  'rasterizerStates'
];

const paramLists = (entry: MatlEntry): Array<Array<Param<unknown>>> => PARAM_LIST_KEYS.map((key) => entry[key]);

export const entryParamIds = (entry: MatlEntry): ParamId[] =>
  paramLists(entry).flatMap((list) => list.map((param) => param.paramId));

const hasParam = (entry: MatlEntry, id: ParamId): boolean =>
  paramLists(entry).some((list) => list.some((param) => param.paramId === id));

// Array.prototype.sort is stable, so equal ids keep their relative order.
const sortByParamCode = <T>(list: Param<T>[]): void => {
  list.sort((a, b) => compareParamIds(a.paramId, b.paramId));
};

export const sortEntryParams = (entry: MatlEntry): void => {
  sortByParamCode(entry.booleans);
  sortByParamCode(entry.floats);
  sortByParamCode(entry.vectors);
  sortByParamCode(entry.textures);
  sortByParamCode(entry.samplers);
  sortByParamCode(entry.blendStates);
  sortByParamCode(entry.rasterizerStates);
};

// Legacy and unknown ids are never added, removed or reported.
const isReconciled = (id: ParamId): boolean => paramKind(id) !== 'other';

/** Parameters the program reads that the entry does not define, in program order. */
export const missingParameters = (entry: MatlEntry, program: ShaderProgram): ParamId[] => {
  const present = new Set(entryParamIds(entry));
  const missing: ParamId[] = [];
  declaredParamNames(program).forEach((name) => {
    if (!isReconciled(name) || present.has(name) || missing.includes(name)) return;
    missing.push(name);
  });
  return missing;
};

/** Parameters the entry defines that the program never reads, in entry order. */
export const unusedParameters = (entry: MatlEntry, program: ShaderProgram): ParamId[] =>
  entryParamIds(entry).filter((id) => isReconciled(id) && !declaresParam(program, id));

export const addParameters = (entry: MatlEntry, ids: readonly ParamId[]): void => {
  ids.forEach((paramId) => {
    if (hasParam(entry, paramId)) return;
    switch (paramKind(paramId)) {
      case 'boolean':
        entry.booleans.push({ paramId, data: false });
        break;
      case 'float':
        entry.floats.push({ paramId, data: 0 });
        break;
      case 'vector4':
        entry.vectors.push({ paramId, data: zeroVector() });
        break;
      case 'texture':
        entry.textures.push({ paramId, data: defaultTexture(paramId) });
        break;
      case 'sampler':
        entry.samplers.push({ paramId, data: defaultSampler() });
        break;
      case 'blend_state':
        entry.blendStates.push({ paramId, data: defaultBlendState() });
        break;
      case 'rasterizer_state':
        entry.rasterizerStates.push({ paramId, data: defaultRasterizerState() });
        break;
      case 'other':
        break;
    }
  });
  sortEntryParams(entry);
};

const swapRemove = <T>(list: Param<T>[], id: ParamId): boolean => {
  const index = list.findIndex((param) => param.paramId === id);
  if (index < 0) return false;
  const last = list.pop();
  if (last && index < list.length) list[index] = last;
  return true;
};

export const removeParameters = (entry: MatlEntry, ids: readonly ParamId[]): void => {
  ids.forEach((paramId) => {
    if (!isReconciled(paramId)) return;
    // Order is restored by the sort below.
    PARAM_LIST_KEYS.some((key) => swapRemove<unknown>(entry[key], paramId));
  });
  sortEntryParams(entry);
};

/** Vector channels the program never reads, keyed by parameter. */
export const unusedChannels = (entry: MatlEntry, program: ShaderProgram): Array<{ paramId: ParamId; unused: ChannelMask }> =>
  entry.vectors
    .filter((param) => declaresParam(program, param.paramId))
    .map((param) => {
      const accessed = accessedChannels(program, param.paramId);
      const unused: ChannelMask = [!accessed[0], !accessed[1], !accessed[2], !accessed[3]];
      return { paramId: param.paramId, unused };
    })
    .filter((item) => item.unused.some(Boolean));

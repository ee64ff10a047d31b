export {
  compareParamIds,
  expectsSrgb,
  isParamId,
  listParamIds,
  paramCode,
  paramKind
} from './classify';
export {
  defaultBlendState,
  defaultRasterizerState,
  defaultSampler,
  defaultTexture,
  paramDescription,
  vector4Labels,
  zeroVector
} from './defaults';

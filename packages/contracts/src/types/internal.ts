export * from './shared';
export * from './material';
export * from './shader';
export * from './files';
export * from './validation';
export {
  BLEND_FACTORS,
  CULL_MODES,
  FILE_KINDS,
  FILL_MODES,
  MAG_FILTERS,
  MAX_ANISOTROPY,
  MIN_FILTERS,
  NUTEXB_FORMATS,
  PARAM_KINDS,
  TEXTURE_DIMENSIONS,
  WRAP_MODES
} from '../schema/constants';

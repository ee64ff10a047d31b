import type {
  BlendStateData,
  ParamId,
  RasterizerStateData,
  SamplerData,
  Vector4
} from '@ssbh-check/contracts/types/internal';
import paramLabels from './paramLabels.json';

export const DEFAULT_WHITE = '/common/shader/sfxpbs/default_white';
export const DEFAULT_BLACK = '/common/shader/sfxpbs/default_black';
export const DEFAULT_NORMAL = '/common/shader/sfxpbs/fighter/default_normal';
export const DEFAULT_PARAMS = '/common/shader/sfxpbs/fighter/default_params';
export const REPLACE_CUBEMAP = '#replace_cubemap';

// Paths the renderer resolves without a texture file in the model folder.
export const DEFAULT_TEXTURE_NAMES: readonly string[] = [
  DEFAULT_BLACK,
  '/common/shader/sfxpbs/default_color',
  '/common/shader/sfxpbs/default_color2',
  '/common/shader/sfxpbs/default_color3',
  '/common/shader/sfxpbs/default_color4',
  '/common/shader/sfxpbs/default_diffuse2',
  '/common/shader/sfxpbs/default_gray',
  '/common/shader/sfxpbs/default_metallicbg',
  '/common/shader/sfxpbs/default_normal',
  '/common/shader/sfxpbs/default_params',
  '/common/shader/sfxpbs/default_params_r000_g025_b100',
  '/common/shader/sfxpbs/default_params_r100_g025_b100',
  '/common/shader/sfxpbs/default_params2',
  '/common/shader/sfxpbs/default_params3',
  DEFAULT_WHITE,
  DEFAULT_NORMAL,
  DEFAULT_PARAMS,
  REPLACE_CUBEMAP
];

const TEXTURE_DEFAULTS: Record<string, string> = {
  Texture2: REPLACE_CUBEMAP,
  Texture4: DEFAULT_NORMAL,
  Texture5: DEFAULT_BLACK,
  Texture6: DEFAULT_PARAMS,
  Texture7: REPLACE_CUBEMAP,
  Texture8: REPLACE_CUBEMAP,
  Texture9: DEFAULT_BLACK,
  Texture14: DEFAULT_BLACK
};

/**
 * Placeholder texture for a slot, picked to have as little visible effect as
 * possible so fewer textures need to be assigned by hand.
 */
export const defaultTexture = (id: ParamId): string => TEXTURE_DEFAULTS[id] ?? DEFAULT_WHITE;

export const defaultSampler = (): SamplerData => ({
  wraps: 'Repeat',
  wrapt: 'Repeat',
  wrapr: 'Repeat',
  minFilter: 'LinearMipmapLinear',
  magFilter: 'Linear',
  borderColor: [0, 0, 0, 0],
  lodBias: 0,
  maxAnisotropy: null
});

export const defaultBlendState = (): BlendStateData => ({
  sourceColor: 'One',
  destinationColor: 'Zero',
  alphaSampleToCoverage: false
});

export const defaultRasterizerState = (): RasterizerStateData => ({
  fillMode: 'Solid',
  cullMode: 'Back',
  depthBias: 0
});

export const zeroVector = (): Vector4 => [0, 0, 0, 0];

const DESCRIPTIONS: Record<string, string> = paramLabels.descriptions;
const LONG_LABELS: Record<string, string[]> = paramLabels.longLabels;
const COLOR_VECTORS = new Set<string>(paramLabels.colorVectors);

type ChannelLabels = [string, string, string, string];

const asChannelLabels = (labels: string[]): ChannelLabels => [
  labels[0] ?? '',
  labels[1] ?? '',
  labels[2] ?? '',
  labels[3] ?? ''
];

export const paramDescription = (id: ParamId): string => DESCRIPTIONS[id] ?? '';

export const vector4Labels = (id: ParamId, style: 'short' | 'long'): ChannelLabels => {
  if (style === 'long') {
    const specific = LONG_LABELS[id];
    if (specific) return asChannelLabels(specific);
    return COLOR_VECTORS.has(id) ? ['Red', 'Green', 'Blue', 'Alpha'] : ['X', 'Y', 'Z', 'W'];
  }
  return COLOR_VECTORS.has(id) ? ['R', 'G', 'B', 'A'] : ['X', 'Y', 'Z', 'W'];
};

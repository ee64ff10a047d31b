export const PARAM_KINDS = [
  'boolean',
  'float',
  'vector4',
  'texture',
  'sampler',
  'blend_state',
  'rasterizer_state',
  'other'
] as const;

export const FILE_KINDS = ['mesh', 'skel', 'matl', 'modl', 'adj', 'anim', 'hlpb', 'meshex', 'nutexb'] as const;

export const NUTEXB_FORMATS = [
  'R8Unorm',
  'R8G8B8A8Unorm',
  'R8G8B8A8Srgb',
  'R32G32B32A32Float',
  'B8G8R8A8Unorm',
  'B8G8R8A8Srgb',
  'BC1Unorm',
  'BC1Srgb',
  'BC2Unorm',
  'BC2Srgb',
  'BC3Unorm',
  'BC3Srgb',
  'BC4Unorm',
  'BC4Snorm',
  'BC5Unorm',
  'BC5Snorm',
  'BC6Ufloat',
  'BC6Sfloat',
  'BC7Unorm',
  'BC7Srgb'
] as const;

export const TEXTURE_DIMENSIONS = ['2d', '3d', 'cube'] as const;

export const WRAP_MODES = ['Repeat', 'ClampToEdge', 'MirroredRepeat', 'ClampToBorder'] as const;
export const MIN_FILTERS = [
  'Nearest',
  'LinearMipmapLinear',
  'LinearMipmapLinear2',
  'Linear'
] as const;
export const MAG_FILTERS = ['Nearest', 'Linear', 'Linear2'] as const;
export const MAX_ANISOTROPY = ['One', 'Two', 'Four', 'Eight', 'Sixteen'] as const;
export const BLEND_FACTORS = [
  'Zero',
  'One',
  'SourceAlpha',
  'DestinationAlpha',
  'SourceColor',
  'DestinationColor',
  'OneMinusSourceAlpha',
  'OneMinusDestinationAlpha',
  'OneMinusSourceColor',
  'OneMinusDestinationColor',
  'SourceAlphaSaturate'
] as const;
export const FILL_MODES = ['Line', 'Solid'] as const;
export const CULL_MODES = ['Back', 'Front', 'Disabled'] as const;

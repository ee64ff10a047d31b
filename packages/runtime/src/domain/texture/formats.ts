import type { NutexbFile, NutexbFormat, ParamId, TextureDimension } from '@ssbh-check/contracts/types/internal';

const SRGB_FORMATS = new Set<NutexbFormat>([
  'R8G8B8A8Srgb',
  'B8G8R8A8Srgb',
  'BC1Srgb',
  'BC2Srgb',
  'BC3Srgb',
  'BC7Srgb'
]);

const CUBE_TEXTURES = new Set<ParamId>(['Texture2', 'Texture7', 'Texture8']);

export const isSrgb = (format: NutexbFormat): boolean => SRGB_FORMATS.has(format);

// Array layers are not considered for depth or cube textures.
export const nutexbDimension = (nutexb: NutexbFile): TextureDimension => {
  if (nutexb.footer.depth > 1) return '3d';
  if (nutexb.footer.layerCount === 6) return 'cube';
  return '2d';
};

export const expectedTextureDimension = (id: ParamId): TextureDimension => (CUBE_TEXTURES.has(id) ? 'cube' : '2d');

import type { TextureDimension } from '@ssbh-check/contracts/types/internal';

const DIMENSION_NAMES: Record<TextureDimension, string> = {
  '2d': '2D texture',
  '3d': '3D texture',
  cube: 'cube map'
};

export const VALIDATION_MISSING_REQUIRED_ATTRIBUTES = (meshName: string, materialLabel: string, missing: string[]) =>
  `Mesh "${meshName}" is missing attributes ${missing.join(', ')} required by assigned material "${materialLabel}".`;
export const VALIDATION_DUPLICATE_SUBINDEX = (meshName: string, subindex: number) =>
  `Mesh "${meshName}" repeats subindex ${subindex}. Subindices must be unique.`;
export const VALIDATION_UNEXPECTED_TEXTURE_FORMAT = (
  nutexb: string,
  materialLabel: string,
  format: string,
  param: string,
  expectsSrgb: boolean
) =>
  `Texture "${nutexb}" for material "${materialLabel}" has format ${format}, but ${param} ${
    expectsSrgb ? 'expects' : 'does not expect'
  } an sRGB format.`;
export const VALIDATION_TEXTURE_FORMAT_INVALID_FOR_USAGE = (
  nutexb: string,
  format: string,
  param: string,
  expectsSrgb: boolean
) => `Texture "${nutexb}" has format ${format}, but ${param} ${expectsSrgb ? 'expects' : 'does not expect'} an sRGB format.`;
export const VALIDATION_UNEXPECTED_TEXTURE_DIMENSION = (
  nutexb: string,
  materialLabel: string,
  param: string,
  expected: TextureDimension,
  actual: TextureDimension
) =>
  `Texture "${nutexb}" for material "${materialLabel}" is a ${DIMENSION_NAMES[actual]}, but ${param} requires a ${DIMENSION_NAMES[expected]}.`;
export const VALIDATION_MISSING_TEXTURE = (nutexb: string, param: string, materialLabel: string) =>
  `Texture "${nutexb}" assigned to param ${param} for material "${materialLabel}" is missing.`;
export const VALIDATION_RENORMAL_MISSING_MESH_ADJ_ENTRY = (
  meshName: string,
  materialLabel: string,
  marker: string,
  adjFile: string
) => `Mesh "${meshName}" has the ${marker} material "${materialLabel}" but no corresponding entry in the ${adjFile}.`;
export const VALIDATION_RENORMAL_MISSING_ADJ = (materialLabel: string, marker: string, adjFile: string) =>
  `Material "${materialLabel}" is a ${marker} material, but the ${adjFile} file is missing.`;

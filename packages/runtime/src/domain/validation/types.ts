import type { NutexbFormat, ParamId, TextureDimension } from '@ssbh-check/contracts/types/internal';

export type ValidationMessages = {
  missingRequiredAttributes: (meshName: string, materialLabel: string, missing: string[]) => string;
  duplicateSubindex: (meshName: string, subindex: number) => string;
  unexpectedTextureFormat: (
    nutexb: string,
    materialLabel: string,
    format: NutexbFormat,
    param: ParamId,
    expectsSrgb: boolean
  ) => string;
  textureFormatInvalidForUsage: (nutexb: string, format: NutexbFormat, param: ParamId, expectsSrgb: boolean) => string;
  unexpectedTextureDimension: (
    nutexb: string,
    materialLabel: string,
    param: ParamId,
    expected: TextureDimension,
    actual: TextureDimension
  ) => string;
  missingTexture: (nutexb: string, param: ParamId, materialLabel: string) => string;
  renormalMissingMeshAdjEntry: (meshName: string, materialLabel: string, marker: string) => string;
  renormalMissingAdj: (materialLabel: string, marker: string) => string;
};

export interface ValidationOptions {
  /** Texture paths resolved by the renderer rather than by a file in the folder. */
  defaultTextureNames?: readonly string[];
  /** Substring marking materials that recalculate normals from adjacency data. */
  renormalMarker?: string;
  messages?: ValidationMessages;
}

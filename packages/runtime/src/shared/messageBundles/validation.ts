import type { ValidationMessages } from '../../domain/validation/types';
import { ADJ_FILE_NAME } from '../../domain/folder/model';
import {
  VALIDATION_DUPLICATE_SUBINDEX,
  VALIDATION_MISSING_REQUIRED_ATTRIBUTES,
  VALIDATION_MISSING_TEXTURE,
  VALIDATION_RENORMAL_MISSING_ADJ,
  VALIDATION_RENORMAL_MISSING_MESH_ADJ_ENTRY,
  VALIDATION_TEXTURE_FORMAT_INVALID_FOR_USAGE,
  VALIDATION_UNEXPECTED_TEXTURE_DIMENSION,
  VALIDATION_UNEXPECTED_TEXTURE_FORMAT
} from '../messages/validation';

export const buildValidationMessages = (): ValidationMessages => ({
  missingRequiredAttributes: VALIDATION_MISSING_REQUIRED_ATTRIBUTES,
  duplicateSubindex: VALIDATION_DUPLICATE_SUBINDEX,
  unexpectedTextureFormat: VALIDATION_UNEXPECTED_TEXTURE_FORMAT,
  textureFormatInvalidForUsage: VALIDATION_TEXTURE_FORMAT_INVALID_FOR_USAGE,
  unexpectedTextureDimension: VALIDATION_UNEXPECTED_TEXTURE_DIMENSION,
  missingTexture: VALIDATION_MISSING_TEXTURE,
  renormalMissingMeshAdjEntry: (meshName, materialLabel, marker) =>
    VALIDATION_RENORMAL_MISSING_MESH_ADJ_ENTRY(meshName, materialLabel, marker, ADJ_FILE_NAME),
  renormalMissingAdj: (materialLabel, marker) => VALIDATION_RENORMAL_MISSING_ADJ(materialLabel, marker, ADJ_FILE_NAME)
});

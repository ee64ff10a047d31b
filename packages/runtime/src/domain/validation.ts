import type { ModelFolder, ValidationReport } from '@ssbh-check/contracts/types/internal';
import type { ShaderProgramLookup } from '../ports/shaderDatabase';
import { buildValidationMessages } from '../shared/messageBundles/validation';
import { DEFAULT_TEXTURE_NAMES } from './params/defaults';
import { findAdj, findMatl, findMesh, findModl } from './folder/model';
import { collectAttributeFindings } from './validation/attributeFindings';
import { buildMaterialBindings } from './validation/joins';
import { collectMeshFindings } from './validation/meshFindings';
import { DEFAULT_RENORMAL_MARKER, collectRenormalFindings } from './validation/renormalFindings';
import { emptyValidationReport } from './validation/report';
import {
  collectTextureAssignmentFindings,
  collectTextureDimensionFindings,
  collectTextureFormatFindings
} from './validation/textureFindings';
import type { ValidationOptions } from './validation/types';

export type { ValidationMessages, ValidationOptions } from './validation/types';
export {
  diagnosticsForEntry,
  diagnosticsForMeshObject,
  diagnosticsForTexture,
  emptyValidationReport,
  reportIsEmpty
} from './validation/report';

/**
 * Cross-file checks for one model folder. Files that are missing or failed to
 * parse only disable the checks that need them; this never throws.
 */
export function validateModelFolder(
  folder: ModelFolder,
  shaders: ShaderProgramLookup,
  options: ValidationOptions = {}
): ValidationReport {
  const report = emptyValidationReport();
  const messages = options.messages ?? buildValidationMessages();

  const mesh = findMesh(folder);
  if (mesh) {
    report.mesh.push(...collectMeshFindings(mesh, messages));
  }

  const matl = findMatl(folder);
  if (!matl) return report;

  const modl = findModl(folder);
  const bindings = mesh && modl ? buildMaterialBindings(mesh, modl) : null;

  if (bindings) {
    const attributes = collectAttributeFindings({ matl, bindings, shaders, messages });
    report.matl.push(...attributes.matl);
    report.mesh.push(...attributes.mesh);
  }

  const textureArgs = { matl, nutexbs: folder.nutexbs, messages };
  const formats = collectTextureFormatFindings(textureArgs);
  report.matl.push(...formats.matl);
  report.nutexb.push(...formats.nutexb);
  report.matl.push(...collectTextureDimensionFindings(textureArgs));
  const defaultTextureNames = options.defaultTextureNames ?? DEFAULT_TEXTURE_NAMES;
  report.matl.push(...collectTextureAssignmentFindings({ ...textureArgs, defaultTextureNames }));

  report.matl.push(
    ...collectRenormalFindings({
      matl,
      adj: findAdj(folder),
      bindings,
      marker: options.renormalMarker ?? DEFAULT_RENORMAL_MARKER,
      messages
    })
  );

  return report;
}

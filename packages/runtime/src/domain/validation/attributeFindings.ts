import type { MatlData, MatlDiagnostic, MeshDiagnostic } from '@ssbh-check/contracts/types/internal';
import type { ShaderProgramLookup } from '../../ports/shaderDatabase';
import { missingRequiredAttributes, resolveProgram } from '../shader/program';
import { meshObjectAttributeNames, type MaterialBindings } from './joins';
import type { ValidationMessages } from './types';

/**
 * Vertex attributes a material's shader reads that an assigned mesh object
 * does not provide. Either file can be changed to fix this, so every finding
 * is reported against both the material entry and the mesh object.
 */
export const collectAttributeFindings = (args: {
  matl: MatlData;
  bindings: MaterialBindings;
  shaders: ShaderProgramLookup;
  messages: ValidationMessages;
}): { matl: MatlDiagnostic[]; mesh: MeshDiagnostic[] } => {
  const matl: MatlDiagnostic[] = [];
  const mesh: MeshDiagnostic[] = [];

  args.matl.entries.forEach((entry, entryIndex) => {
    // Unknown shader labels are reported by the material editor instead.
    const program = resolveProgram(args.shaders, entry.shaderLabel);
    if (!program) return;

    args.bindings.meshObjectsFor(entry.materialLabel).forEach(({ index, object }) => {
      const missingAttributes = missingRequiredAttributes(program, meshObjectAttributeNames(object));
      if (missingAttributes.length === 0) return;
      const message = args.messages.missingRequiredAttributes(object.name, entry.materialLabel, missingAttributes);
      matl.push({
        code: 'missing_required_vertex_attributes',
        entryIndex,
        materialLabel: entry.materialLabel,
        meshName: object.name,
        missingAttributes: [...missingAttributes],
        message
      });
      mesh.push({
        code: 'missing_required_vertex_attributes',
        meshObjectIndex: index,
        meshName: object.name,
        materialLabel: entry.materialLabel,
        missingAttributes,
        message
      });
    });
  });

  return { matl, mesh };
};

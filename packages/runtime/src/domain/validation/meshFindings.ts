import type { MeshData, MeshDiagnostic } from '@ssbh-check/contracts/types/internal';
import type { ValidationMessages } from './types';

// Material and vertex weight assignments need a unique subindex per mesh object name.
export const collectMeshFindings = (mesh: MeshData, messages: ValidationMessages): MeshDiagnostic[] => {
  const findings: MeshDiagnostic[] = [];
  const subindicesByName = new Map<string, Set<number>>();

  mesh.objects.forEach((object, meshObjectIndex) => {
    const seen = subindicesByName.get(object.name) ?? new Set<number>();
    subindicesByName.set(object.name, seen);
    if (!seen.has(object.subindex)) {
      seen.add(object.subindex);
      return;
    }
    findings.push({
      code: 'duplicate_subindex',
      meshObjectIndex,
      meshName: object.name,
      subindex: object.subindex,
      message: messages.duplicateSubindex(object.name, object.subindex)
    });
  });

  return findings;
};

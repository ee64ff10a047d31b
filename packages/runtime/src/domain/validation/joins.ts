import type { MeshData, MeshObject, ModlData, ModlEntry } from '@ssbh-check/contracts/types/internal';

export type IndexedMeshObject = { index: number; object: MeshObject };

/**
 * Material assignments resolved once per validation pass. Model entries
 * refer to mesh objects by name and subindex and to materials by label.
 */
export interface MaterialBindings {
  /** Mesh objects assigned to `materialLabel`, in mesh order. */
  meshObjectsFor: (materialLabel: string) => IndexedMeshObject[];
  /**
   * One mesh object per model entry using `materialLabel`, in model order.
   * Entries that name no mesh object are dropped.
   */
  modlObjectsFor: (materialLabel: string) => IndexedMeshObject[];
}

const objectKey = (name: string, subindex: number): string => `${subindex}:${name}`;
const entryKey = (entry: ModlEntry): string => objectKey(entry.meshObjectName, entry.meshObjectSubindex);

export const buildMaterialBindings = (mesh: MeshData, modl: ModlData): MaterialBindings => {
  const labelsByObject = new Map<string, Set<string>>();
  const entriesByLabel = new Map<string, ModlEntry[]>();
  modl.entries.forEach((entry) => {
    const key = entryKey(entry);
    const labels = labelsByObject.get(key) ?? new Set<string>();
    labels.add(entry.materialLabel);
    labelsByObject.set(key, labels);
    const entries = entriesByLabel.get(entry.materialLabel) ?? [];
    entries.push(entry);
    entriesByLabel.set(entry.materialLabel, entries);
  });

  const firstObjectByKey = new Map<string, IndexedMeshObject>();
  mesh.objects.forEach((object, index) => {
    const key = objectKey(object.name, object.subindex);
    if (!firstObjectByKey.has(key)) firstObjectByKey.set(key, { index, object });
  });

  return {
    meshObjectsFor: (materialLabel) =>
      mesh.objects
        .map((object, index) => ({ index, object }))
        .filter(({ object }) => labelsByObject.get(objectKey(object.name, object.subindex))?.has(materialLabel) ?? false),
    modlObjectsFor: (materialLabel) =>
      (entriesByLabel.get(materialLabel) ?? []).flatMap((entry) => {
        const found = firstObjectByKey.get(entryKey(entry));
        return found ? [found] : [];
      })
  };
};

export const meshObjectAttributeNames = (object: MeshObject): string[] => [
  ...object.textureCoordinates.map((attribute) => attribute.name),
  ...object.colorSets.map((attribute) => attribute.name)
];

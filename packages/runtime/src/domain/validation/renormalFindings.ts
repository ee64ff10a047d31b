import type { AdjData, MatlData, MatlDiagnostic } from '@ssbh-check/contracts/types/internal';
import type { MaterialBindings } from './joins';
import type { ValidationMessages } from './types';

export const DEFAULT_RENORMAL_MARKER = 'RENORMAL';

/**
 * Materials whose label contains the marker recalculate normals at runtime
 * and need adjacency data for every assigned mesh object.
 *
 * Adjacency entries are matched by the mesh object's position among the
 * material's model entries, not by its index in the mesh file.
 */
export const collectRenormalFindings = (args: {
  matl: MatlData;
  adj: AdjData | null;
  bindings: MaterialBindings | null;
  marker: string;
  messages: ValidationMessages;
}): MatlDiagnostic[] => {
  const findings: MatlDiagnostic[] = [];

  args.matl.entries.forEach((entry, entryIndex) => {
    if (!entry.materialLabel.includes(args.marker)) return;

    if (!args.adj) {
      findings.push({
        code: 'renormal_missing_adj',
        entryIndex,
        materialLabel: entry.materialLabel,
        message: args.messages.renormalMissingAdj(entry.materialLabel, args.marker)
      });
      return;
    }

    const adjEntries = args.adj.entries;
    args.bindings?.modlObjectsFor(entry.materialLabel).forEach(({ object }, position) => {
      if (adjEntries.some((adjEntry) => adjEntry.meshObjectIndex === position)) return;
      findings.push({
        code: 'renormal_missing_mesh_adj_entry',
        entryIndex,
        materialLabel: entry.materialLabel,
        meshName: object.name,
        message: args.messages.renormalMissingMeshAdjEntry(object.name, entry.materialLabel, args.marker)
      });
    });
  });

  return findings;
};

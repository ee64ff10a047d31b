import type {
  MatlDiagnostic,
  MeshDiagnostic,
  NutexbDiagnostic,
  ValidationReport
} from '@ssbh-check/contracts/types/internal';
import { FILE_KINDS } from '@ssbh-check/contracts/schema/constants';

export const emptyValidationReport = (): ValidationReport => ({
  mesh: [],
  skel: [],
  matl: [],
  modl: [],
  adj: [],
  anim: [],
  hlpb: [],
  meshex: [],
  nutexb: []
});

export const reportIsEmpty = (report: ValidationReport): boolean =>
  FILE_KINDS.every((kind) => report[kind].length === 0);

// Labels are not unique in user-made files, so lookups go by index.
export const diagnosticsForEntry = (report: ValidationReport, entryIndex: number): MatlDiagnostic[] =>
  report.matl.filter((diagnostic) => diagnostic.entryIndex === entryIndex);

export const diagnosticsForMeshObject = (report: ValidationReport, meshObjectIndex: number): MeshDiagnostic[] =>
  report.mesh.filter((diagnostic) => diagnostic.meshObjectIndex === meshObjectIndex);

export const diagnosticsForTexture = (report: ValidationReport, fileName: string): NutexbDiagnostic[] =>
  report.nutexb.filter((diagnostic) => diagnostic.nutexb === fileName);

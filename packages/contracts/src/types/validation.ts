import type { NutexbFormat, TextureDimension } from './files';
import type { ParamId } from './material';

export type MeshDiagnostic =
  | {
      code: 'missing_required_vertex_attributes';
      meshObjectIndex: number;
      meshName: string;
      materialLabel: string;
      missingAttributes: string[];
      message: string;
    }
  | {
      code: 'duplicate_subindex';
      meshObjectIndex: number;
      meshName: string;
      subindex: number;
      message: string;
    };

export type MatlDiagnostic =
  | {
      code: 'missing_required_vertex_attributes';
      entryIndex: number;
      materialLabel: string;
      meshName: string;
      missingAttributes: string[];
      message: string;
    }
  | {
      code: 'unexpected_texture_format';
      entryIndex: number;
      materialLabel: string;
      param: ParamId;
      nutexb: string;
      format: NutexbFormat;
      message: string;
    }
  | {
      code: 'unexpected_texture_dimension';
      entryIndex: number;
      materialLabel: string;
      param: ParamId;
      nutexb: string;
      expected: TextureDimension;
      actual: TextureDimension;
      message: string;
    }
  | {
      code: 'missing_texture';
      entryIndex: number;
      materialLabel: string;
      param: ParamId;
      nutexb: string;
      message: string;
    }
  | {
      code: 'renormal_missing_mesh_adj_entry';
      entryIndex: number;
      materialLabel: string;
      meshName: string;
      message: string;
    }
  | {
      code: 'renormal_missing_adj';
      entryIndex: number;
      materialLabel: string;
      message: string;
    };

export type NutexbDiagnostic = {
  code: 'format_invalid_for_usage';
  nutexb: string;
  format: NutexbFormat;
  param: ParamId;
  message: string;
};

// No checks report against these file kinds yet.
export type NoDiagnostic = never;

/**
 * Findings for one model folder, grouped by the file they should be shown
 * next to. Replaced wholesale on every validation pass.
 */
export interface ValidationReport {
  mesh: MeshDiagnostic[];
  skel: NoDiagnostic[];
  matl: MatlDiagnostic[];
  modl: NoDiagnostic[];
  adj: NoDiagnostic[];
  anim: NoDiagnostic[];
  hlpb: NoDiagnostic[];
  meshex: NoDiagnostic[];
  nutexb: NutexbDiagnostic[];
}

export type MeshDiagnosticCode = MeshDiagnostic['code'];
export type MatlDiagnosticCode = MatlDiagnostic['code'];

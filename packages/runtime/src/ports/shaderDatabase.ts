import type { ShaderProgram } from '@ssbh-check/contracts/types/internal';

/**
 * Read-only view of the shader database. Keys are the first 24 characters of
 * a material's shader label.
 */
export interface ShaderProgramLookup {
  get: (programName: string) => ShaderProgram | undefined;
}

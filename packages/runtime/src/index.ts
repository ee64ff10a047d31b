export * from './domain/params';
export {
  SHADER_LOOKUP_KEY_LENGTH,
  accessedChannels,
  missingRequiredAttributes,
  programLookupKey,
  resolveProgram,
  splitParam
} from './domain/shader/program';
export { ShaderDatabase, parseShaderDatabase } from './domain/shader/database';
export {
  addParameters,
  missingParameters,
  removeParameters,
  sortEntryParams,
  unusedChannels,
  unusedParameters
} from './domain/material/reconcile';
export { applyPreset, defaultMaterial, defaultPresets } from './domain/material/presets';
export { parseMatlData, parseMatlEntry } from './domain/material/parse';
export {
  diagnosticsForEntry,
  diagnosticsForMeshObject,
  diagnosticsForTexture,
  reportIsEmpty,
  validateModelFolder,
  type ValidationMessages,
  type ValidationOptions
} from './domain/validation';
export {
  findAnimFolders,
  findSwingFolders,
  folderDisplayName,
  folderEditorTitle,
  rankFoldersByAffinity,
  type AffinityFolder,
  type RankedFolder
} from './domain/folder/affinity';
export { emptyModelFolder, isModelFolder } from './domain/folder/model';
export type { DomainResult } from './domain/result';
export type { ShaderProgramLookup } from './ports/shaderDatabase';
export { loadShaderDatabase } from './adapters/files/shaderDatabaseFile';
export { loadMaterialPresets } from './adapters/files/materialPresets';
export {
  ModelFolderService,
  createModelFolderService,
  type MaterialTarget,
  type ModelFolderServiceDeps,
  type ModelFolderState
} from './usecases/ModelFolderService';
export type { UsecaseResult } from './usecases/result';
export { ConsoleLogger, type Logger, type LogLevel } from './logging';
export { resolveRuntimeConfig, type RuntimeConfig } from './config';

import type {
  FileDataByKind,
  FileKind,
  FileSlot,
  MatlData,
  MatlEntry,
  ModelFolder,
  ParamId,
  ShaderProgram,
  SwingPrc,
  ValidationReport
} from '@ssbh-check/contracts/types/internal';
import type { Logger } from '../logging';
import type { RuntimeConfig } from '../config';
import type { ShaderProgramLookup } from '../ports/shaderDatabase';
import { validateModelFolder, type ValidationOptions } from '../domain/validation';
import { fileChangedFor, folderSlots, isModelFolder, type FileChanged } from '../domain/folder/model';
import { findAnimFolders, findSwingFolders, type RankedFolder } from '../domain/folder/affinity';
import {
  addParameters,
  missingParameters,
  removeParameters,
  unusedParameters
} from '../domain/material/reconcile';
import { applyPreset } from '../domain/material/presets';
import { resolveProgram } from '../domain/shader/program';
import { fail, ok, type UsecaseResult } from './result';
import {
  FOLDER_FILE_NOT_FOUND,
  FOLDER_FILE_NOT_PARSED,
  FOLDER_NOT_FOUND,
  MATL_ENTRY_NOT_FOUND,
  MATL_NO_MISSING_PARAMETERS,
  MATL_NO_UNUSED_PARAMETERS,
  MATL_SHADER_UNRESOLVED
} from '../shared/messages/folder';

export interface ModelFolderState {
  model: ModelFolder;
  validation: ValidationReport;
  changed: FileChanged;
  swingPrc: SwingPrc | null;
}

export interface ModelFolderServiceDeps {
  shaders: ShaderProgramLookup;
  logger: Logger;
  validationOptions?: ValidationOptions;
}

export interface MaterialTarget {
  folderIndex: number;
  matlIndex: number;
  entryIndex: number;
}

type ResolvedEntry = {
  state: ModelFolderState;
  entry: MatlEntry;
};

export class ModelFolderService {
  private readonly shaders: ShaderProgramLookup;
  private readonly logger: Logger;
  private readonly validationOptions: ValidationOptions;
  private readonly folders: ModelFolderState[] = [];

  constructor(deps: ModelFolderServiceDeps) {
    this.shaders = deps.shaders;
    this.logger = deps.logger;
    this.validationOptions = deps.validationOptions ?? {};
  }

  get size(): number {
    return this.folders.length;
  }

  list(): readonly ModelFolderState[] {
    return this.folders;
  }

  get(folderIndex: number): ModelFolderState | null {
    return this.folders[folderIndex] ?? null;
  }

  /** Opens a folder, validates it and returns its index. */
  addFolder(model: ModelFolder, swingPrc: SwingPrc | null = null): number {
    const state: ModelFolderState = {
      model,
      validation: this.validate(model),
      changed: fileChangedFor(model),
      swingPrc
    };
    this.folders.push(state);
    return this.folders.length - 1;
  }

  replaceFile<K extends FileKind>(
    folderIndex: number,
    kind: K,
    fileIndex: number,
    slot: FileSlot<FileDataByKind[K]>
  ): UsecaseResult<{ validation: ValidationReport }> {
    const state = this.folders[folderIndex];
    if (!state) return fail({ code: 'invalid_state', message: FOLDER_NOT_FOUND(folderIndex) });
    const slots = folderSlots(state.model)[kind];
    if (fileIndex < 0 || fileIndex >= slots.length) {
      return fail({ code: 'invalid_state', message: FOLDER_FILE_NOT_FOUND(kind, fileIndex) });
    }
    slots[fileIndex] = slot;
    this.markChanged(state, kind, fileIndex);
    this.revalidate(state);
    return ok({ validation: state.validation });
  }

  validateAll(): void {
    this.folders.forEach((state) => this.revalidate(state));
  }

  report(folderIndex: number): ValidationReport | null {
    return this.folders[folderIndex]?.validation ?? null;
  }

  isModelFolder(folderIndex: number): boolean {
    const state = this.folders[folderIndex];
    return state ? isModelFolder(state.model) : false;
  }

  animFoldersFor(folderIndex: number): RankedFolder<ModelFolderState>[] {
    const state = this.folders[folderIndex];
    return state ? findAnimFolders(state, this.folders) : [];
  }

  swingFoldersFor(folderIndex: number): RankedFolder<ModelFolderState>[] {
    const state = this.folders[folderIndex];
    return state ? findSwingFolders(state, this.folders) : [];
  }

  addMissingParameters(target: MaterialTarget): UsecaseResult<{ added: ParamId[] }> {
    const resolved = this.resolveEntryWithProgram(target);
    if (!resolved.ok) return resolved;
    const { state, entry, program } = resolved.value;
    const missing = missingParameters(entry, program);
    if (missing.length === 0) {
      return fail({ code: 'no_change', message: MATL_NO_MISSING_PARAMETERS(entry.materialLabel) });
    }
    addParameters(entry, missing);
    this.afterMaterialEdit(state, target, 'added missing parameters', { params: missing });
    return ok({ added: missing });
  }

  removeUnusedParameters(target: MaterialTarget): UsecaseResult<{ removed: ParamId[] }> {
    const resolved = this.resolveEntryWithProgram(target);
    if (!resolved.ok) return resolved;
    const { state, entry, program } = resolved.value;
    const unused = unusedParameters(entry, program);
    if (unused.length === 0) {
      return fail({ code: 'no_change', message: MATL_NO_UNUSED_PARAMETERS(entry.materialLabel) });
    }
    removeParameters(entry, unused);
    this.afterMaterialEdit(state, target, 'removed unused parameters', { params: unused });
    return ok({ removed: unused });
  }

  applyMaterialPreset(target: MaterialTarget, preset: MatlEntry): UsecaseResult<{ entry: MatlEntry }> {
    const resolved = this.resolveEntry(target);
    if (!resolved.ok) return resolved;
    const { state, entry } = resolved.value;
    const updated = applyPreset(entry, preset);
    this.matlOf(state, target.matlIndex)?.entries.splice(target.entryIndex, 1, updated);
    this.afterMaterialEdit(state, target, 'applied material preset', { shaderLabel: updated.shaderLabel });
    return ok({ entry: updated });
  }

  private validate(model: ModelFolder): ValidationReport {
    const report = validateModelFolder(model, this.shaders, this.validationOptions);
    this.logger.debug('validated model folder', {
      folder: model.folderPath,
      matl: report.matl.length,
      mesh: report.mesh.length,
      nutexb: report.nutexb.length
    });
    return report;
  }

  private revalidate(state: ModelFolderState): void {
    state.validation = this.validate(state.model);
  }

  private markChanged(state: ModelFolderState, kind: FileKind, fileIndex: number): void {
    state.changed[kind][fileIndex] = true;
  }

  private afterMaterialEdit(
    state: ModelFolderState,
    target: MaterialTarget,
    action: string,
    meta: Record<string, unknown>
  ): void {
    this.markChanged(state, 'matl', target.matlIndex);
    this.revalidate(state);
    this.logger.info(action, {
      folder: state.model.folderPath,
      matlIndex: target.matlIndex,
      entryIndex: target.entryIndex,
      ...meta
    });
  }

  private matlOf(state: ModelFolderState, matlIndex: number): MatlData | null {
    const slot: FileSlot<MatlData> | undefined = state.model.matls[matlIndex];
    return slot && slot.file.ok ? slot.file.data : null;
  }

  private resolveEntry(target: MaterialTarget): UsecaseResult<ResolvedEntry> {
    const state = this.folders[target.folderIndex];
    if (!state) return fail({ code: 'invalid_state', message: FOLDER_NOT_FOUND(target.folderIndex) });
    const slot = state.model.matls[target.matlIndex];
    if (!slot) return fail({ code: 'invalid_state', message: FOLDER_FILE_NOT_FOUND('matl', target.matlIndex) });
    if (!slot.file.ok) return fail({ code: 'invalid_state', message: FOLDER_FILE_NOT_PARSED(slot.name) });
    const entry = slot.file.data.entries[target.entryIndex];
    if (!entry) return fail({ code: 'invalid_state', message: MATL_ENTRY_NOT_FOUND(target.entryIndex) });
    return ok({ state, entry });
  }

  private resolveEntryWithProgram(
    target: MaterialTarget
  ): UsecaseResult<ResolvedEntry & { program: ShaderProgram }> {
    const resolved = this.resolveEntry(target);
    if (!resolved.ok) return resolved;
    const { entry } = resolved.value;
    const program = resolveProgram(this.shaders, entry.shaderLabel);
    if (!program) {
      return fail({
        code: 'invalid_state',
        message: MATL_SHADER_UNRESOLVED(entry.shaderLabel),
        details: { shaderLabel: entry.shaderLabel }
      });
    }
    return ok({ ...resolved.value, program });
  }
}

/** Builds a service whose validation follows the resolved runtime settings. */
export const createModelFolderService = (
  config: Pick<RuntimeConfig, 'defaultTextureNames' | 'renormalMarker'>,
  deps: Omit<ModelFolderServiceDeps, 'validationOptions'>
): ModelFolderService =>
  new ModelFolderService({
    ...deps,
    validationOptions: {
      defaultTextureNames: config.defaultTextureNames,
      renormalMarker: config.renormalMarker
    }
  });

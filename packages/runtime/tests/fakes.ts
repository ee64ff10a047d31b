import type {
  AdjData,
  FileSlot,
  MatlData,
  MatlEntry,
  MeshData,
  MeshObject,
  ModelFolder,
  ModlData,
  ModlEntry,
  NutexbFile,
  NutexbFormat,
  ShaderProgram
} from '@ssbh-check/contracts/types/internal';
import type { Logger, LogLevel } from '../src/logging';
import type { ShaderProgramLookup } from '../src/ports/shaderDatabase';
import { emptyModelFolder } from '../src/domain/folder/model';

export type LogRecord = { level: LogLevel; message: string; meta?: Record<string, unknown> };

export class RecordingLogger implements Logger {
  readonly records: LogRecord[] = [];

  log(level: LogLevel, message: string, meta?: Record<string, unknown>): void {
    this.records.push({ level, message, meta });
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.log('debug', message, meta);
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.log('info', message, meta);
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.log('warn', message, meta);
  }

  error(message: string, meta?: Record<string, unknown>): void {
    this.log('error', message, meta);
  }

  at(level: LogLevel): LogRecord[] {
    return this.records.filter((record) => record.level === level);
  }
}

export const createShaderLookup = (programs: Record<string, ShaderProgram>): ShaderProgramLookup & { calls: string[] } => {
  const calls: string[] = [];
  return {
    calls,
    get: (programName) => {
      calls.push(programName);
      return programs[programName];
    }
  };
};

// 24 character program names; material labels append a render pass suffix.
export const SHADER_UV = 'SFX_PBS_010002000800824f';
export const SHADER_PLAIN = 'SFX_PBS_0100000008008269';

export const shaderPrograms = (): Record<string, ShaderProgram> => ({
  [SHADER_UV]: {
    materialParameters: ['CustomVector0.x', 'Texture0', 'Sampler0', 'BlendState0', 'RasterizerState0'],
    vertexAttributes: ['map1', 'uvSet'],
    discard: false
  },
  [SHADER_PLAIN]: {
    materialParameters: [
      'CustomBoolean1',
      'CustomFloat8',
      'CustomVector0.xw',
      'CustomVector8',
      'Texture0',
      'Texture4',
      'Sampler0',
      'Sampler4',
      'BlendState0',
      'RasterizerState0'
    ],
    vertexAttributes: ['map1'],
    discard: false
  }
});

export const emptyEntry = (materialLabel: string, shaderLabel = `${SHADER_PLAIN}_opaque`): MatlEntry => ({
  materialLabel,
  shaderLabel,
  booleans: [],
  floats: [],
  vectors: [],
  textures: [],
  samplers: [],
  blendStates: [],
  rasterizerStates: []
});

export const meshObject = (name: string, subindex: number, attributes: string[] = []): MeshObject => ({
  name,
  subindex,
  textureCoordinates: attributes.map((attribute) => ({ name: attribute })),
  colorSets: []
});

export const meshData = (objects: MeshObject[]): MeshData => ({ majorVersion: 1, minorVersion: 10, objects });

export const modlEntry = (meshObjectName: string, meshObjectSubindex: number, materialLabel: string): ModlEntry => ({
  meshObjectName,
  meshObjectSubindex,
  materialLabel
});

export const modlData = (entries: ModlEntry[]): ModlData => ({
  modelName: 'model',
  skeletonFileName: 'model.nusktb',
  materialFileNames: ['model.numatb'],
  animationFileName: null,
  meshFileName: 'model.numshb',
  entries
});

export const matlData = (entries: MatlEntry[]): MatlData => ({ majorVersion: 1, minorVersion: 6, entries });

export const adjData = (meshObjectIndices: number[]): AdjData => ({
  entries: meshObjectIndices.map((meshObjectIndex) => ({ meshObjectIndex, vertexAdjacency: [] }))
});

export const nutexb = (
  name: string,
  imageFormat: NutexbFormat,
  shape: { depth?: number; layerCount?: number } = {}
): NutexbFile => ({
  footer: {
    name,
    width: 64,
    height: 64,
    depth: shape.depth ?? 1,
    imageFormat,
    mipmapCount: 1,
    layerCount: shape.layerCount ?? 1
  }
});

export const parsed = <T>(name: string, data: T): FileSlot<T> => ({ name, file: { ok: true, data } });

export const unparsed = <T>(name: string, message = 'unexpected end of file'): FileSlot<T> => ({
  name,
  file: { ok: false, error: { message } }
});

export const modelFolder = (folderPath: string, slots: Partial<Omit<ModelFolder, 'folderPath'>> = {}): ModelFolder => ({
  ...emptyModelFolder(folderPath),
  ...slots
});

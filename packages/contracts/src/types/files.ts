import type { FILE_KINDS, NUTEXB_FORMATS, TEXTURE_DIMENSIONS } from '../schema/constants';
import type { MatlData } from './material';

export type FileKind = typeof FILE_KINDS[number];
export type NutexbFormat = typeof NUTEXB_FORMATS[number];
export type TextureDimension = typeof TEXTURE_DIMENSIONS[number];

export interface ParseError {
  message: string;
}

export type FileResult<T> = { ok: true; data: T } | { ok: false; error: ParseError };

export type FileSlot<T> = {
  name: string;
  file: FileResult<T>;
};

export type AttributeName = { name: string };

export type MeshObject = {
  name: string;
  subindex: number;
  textureCoordinates: AttributeName[];
  colorSets: AttributeName[];
};

export interface MeshData {
  majorVersion: number;
  minorVersion: number;
  objects: MeshObject[];
}

export type ModlEntry = {
  meshObjectName: string;
  meshObjectSubindex: number;
  materialLabel: string;
};

export interface ModlData {
  modelName: string;
  skeletonFileName: string;
  materialFileNames: string[];
  animationFileName: string | null;
  meshFileName: string;
  entries: ModlEntry[];
}

export type AdjEntry = {
  meshObjectIndex: number;
  vertexAdjacency: number[];
};

export interface AdjData {
  entries: AdjEntry[];
}

export interface NutexbFooter {
  name: string;
  width: number;
  height: number;
  depth: number;
  imageFormat: NutexbFormat;
  mipmapCount: number;
  layerCount: number;
}

export interface NutexbFile {
  footer: NutexbFooter;
}

export type SkelBone = { name: string; parentIndex: number | null };

export interface SkelData {
  bones: SkelBone[];
}

export interface AnimData {
  finalFrameIndex: number;
  groups: Array<{ groupType: string; nodes: Array<{ name: string }> }>;
}

export interface HlpbData {
  aimConstraints: Array<{ name: string }>;
  orientConstraints: Array<{ name: string }>;
}

export interface MeshExData {
  meshObjectGroups: Array<{ meshObjectFullName: string; meshObjectName: string }>;
}

export interface SwingPrc {
  bones: Array<{ name: string }>;
}

/**
 * Parsed contents of one model folder. Every slot keeps its file name even
 * when parsing failed so the file can still be listed.
 */
export interface ModelFolder {
  folderPath: string;
  meshes: FileSlot<MeshData>[];
  skels: FileSlot<SkelData>[];
  matls: FileSlot<MatlData>[];
  modls: FileSlot<ModlData>[];
  adjs: FileSlot<AdjData>[];
  anims: FileSlot<AnimData>[];
  hlpbs: FileSlot<HlpbData>[];
  meshexes: FileSlot<MeshExData>[];
  nutexbs: FileSlot<NutexbFile>[];
}

export type FileDataByKind = {
  mesh: MeshData;
  skel: SkelData;
  matl: MatlData;
  modl: ModlData;
  adj: AdjData;
  anim: AnimData;
  hlpb: HlpbData;
  meshex: MeshExData;
  nutexb: NutexbFile;
};

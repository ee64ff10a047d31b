import type {
  AdjData,
  FileDataByKind,
  FileKind,
  FileSlot,
  MatlData,
  MeshData,
  ModelFolder,
  ModlData,
  SkelData
} from '@ssbh-check/contracts/types/internal';

export const MESH_FILE_NAME = 'model.numshb';
export const SKEL_FILE_NAME = 'model.nusktb';
export const MATL_FILE_NAME = 'model.numatb';
export const MODL_FILE_NAME = 'model.numdlb';
export const ADJ_FILE_NAME = 'model.adjb';

export const emptyModelFolder = (folderPath: string): ModelFolder => ({
  folderPath,
  meshes: [],
  skels: [],
  matls: [],
  modls: [],
  adjs: [],
  anims: [],
  hlpbs: [],
  meshexes: [],
  nutexbs: []
});

// Slots that failed to parse are treated as absent.
const findParsed = <T>(slots: readonly FileSlot<T>[], name: string): T | null => {
  const slot = slots.find((candidate) => candidate.name === name);
  return slot && slot.file.ok ? slot.file.data : null;
};

export const findMesh = (folder: ModelFolder): MeshData | null => findParsed(folder.meshes, MESH_FILE_NAME);
export const findSkel = (folder: ModelFolder): SkelData | null => findParsed(folder.skels, SKEL_FILE_NAME);
export const findMatl = (folder: ModelFolder): MatlData | null => findParsed(folder.matls, MATL_FILE_NAME);
export const findModl = (folder: ModelFolder): ModlData | null => findParsed(folder.modls, MODL_FILE_NAME);
export const findAdj = (folder: ModelFolder): AdjData | null => findParsed(folder.adjs, ADJ_FILE_NAME);

/** Folders with any of the files used for mesh rendering. */
export const isModelFolder = (folder: ModelFolder): boolean =>
  folder.meshes.length > 0 || folder.modls.length > 0 || folder.skels.length > 0 || folder.matls.length > 0;

export type FileChanged = Record<FileKind, boolean[]>;

export const fileChangedFor = (folder: ModelFolder): FileChanged => {
  const slots = folderSlots(folder);
  return {
    mesh: slots.mesh.map(() => false),
    skel: slots.skel.map(() => false),
    matl: slots.matl.map(() => false),
    modl: slots.modl.map(() => false),
    adj: slots.adj.map(() => false),
    anim: slots.anim.map(() => false),
    hlpb: slots.hlpb.map(() => false),
    meshex: slots.meshex.map(() => false),
    nutexb: slots.nutexb.map(() => false)
  };
};

export type FolderSlots = { [K in FileKind]: FileSlot<FileDataByKind[K]>[] };

/** The folder's slot arrays keyed by file kind. Arrays are shared, not copied. */
export const folderSlots = (folder: ModelFolder): FolderSlots => ({
  mesh: folder.meshes,
  skel: folder.skels,
  matl: folder.matls,
  modl: folder.modls,
  adj: folder.adjs,
  anim: folder.anims,
  hlpb: folder.hlpbs,
  meshex: folder.meshexes,
  nutexb: folder.nutexbs
});

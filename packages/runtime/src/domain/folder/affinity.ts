import type { ModelFolder, SwingPrc } from '@ssbh-check/contracts/types/internal';

export interface AffinityFolder {
  model: ModelFolder;
  swingPrc?: SwingPrc | null;
}

export type RankedFolder<T> = [index: number, folder: T];

/**
 * Path components in order, with a leading `/` component for absolute paths.
 * Repeated and trailing separators and `.` segments are ignored.
 */
export const pathComponents = (path: string): string[] => {
  const parts = path.split(/[\\/]+/).filter((part) => part !== '' && part !== '.');
  return /^[\\/]/.test(path) ? ['/', ...parts] : parts;
};

export const trailingMatchCount = (a: string, b: string): number => {
  const left = pathComponents(a).reverse();
  const right = pathComponents(b).reverse();
  let count = 0;
  while (count < left.length && count < right.length && left[count] === right[count]) count += 1;
  return count;
};

/**
 * Candidates passing `predicate`, ordered by increasing number of trailing
 * path components shared with `target`. The best match is last; ties keep
 * their input order.
 *
 * For the model folder `/mario/model/body/c00`, `/mario/motion/body/c00`
 * (2 components) ranks above `/mario/motion/pump/c00` (1 component).
 */
export const rankFoldersByAffinity = <T extends AffinityFolder>(
  target: AffinityFolder,
  candidates: readonly T[],
  predicate: (folder: T) => boolean
): RankedFolder<T>[] =>
  candidates
    .map((folder, index): RankedFolder<T> => [index, folder])
    .filter(([, folder]) => predicate(folder))
    .map((ranked) => ({ ranked, score: trailingMatchCount(target.model.folderPath, ranked[1].model.folderPath) }))
    .sort((a, b) => a.score - b.score)
    .map(({ ranked }) => ranked);

export const findAnimFolders = <T extends AffinityFolder>(target: AffinityFolder, folders: readonly T[]) =>
  rankFoldersByAffinity(target, folders, (folder) => folder.model.anims.length > 0);

export const findSwingFolders = <T extends AffinityFolder>(target: AffinityFolder, folders: readonly T[]) =>
  rankFoldersByAffinity(target, folders, (folder) => Boolean(folder.swingPrc));

/** `fighter/mario/motion/body/c00` -> `mario/motion/body/c00` */
export const folderDisplayName = (folderPath: string): string =>
  pathComponents(folderPath)
    .filter((part) => part !== '/')
    .slice(-4)
    .join('/');

/** `fighter/mario/model/body/c00` + `model.numatb` -> `c00/model.numatb` */
export const folderEditorTitle = (folderPath: string, fileName: string): string => {
  const last = pathComponents(folderPath).filter((part) => part !== '/').pop() ?? '';
  return `${last}/${fileName}`;
};

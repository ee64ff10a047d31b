import assert from 'node:assert/strict';

import type { SwingPrc } from '@ssbh-check/contracts/types/internal';
import {
  findAnimFolders,
  findSwingFolders,
  folderDisplayName,
  folderEditorTitle,
  pathComponents,
  rankFoldersByAffinity,
  trailingMatchCount,
  type AffinityFolder
} from '../src/domain/folder/affinity';
import { modelFolder, parsed, unparsed } from './fakes';

const folder = (folderPath: string, options: { anims?: number; swingPrc?: SwingPrc } = {}): AffinityFolder => ({
  model: modelFolder(folderPath, {
    anims: Array.from({ length: options.anims ?? 0 }, (_, i) =>
      parsed(`a${i}.nuanmb`, { finalFrameIndex: 10, groups: [] })
    )
  }),
  swingPrc: options.swingPrc ?? null
});

const indices = (ranked: Array<[number, AffinityFolder]>): number[] => ranked.map(([index]) => index);

{
  assert.deepEqual(pathComponents('/mario/model/body/c00'), ['/', 'mario', 'model', 'body', 'c00']);
  assert.deepEqual(pathComponents('mario\\model\\body\\c00\\'), ['mario', 'model', 'body', 'c00']);
  assert.deepEqual(pathComponents('./mario//c00'), ['mario', 'c00']);
  assert.deepEqual(pathComponents(''), []);
}

{
  assert.equal(trailingMatchCount('/model/body/c00', '/motion/body/c00'), 2);
  assert.equal(trailingMatchCount('/model/body/c00', '/motion/pump/c00'), 1);
  assert.equal(trailingMatchCount('/model/body/c00', '/motion/body/c01'), 0);
  assert.equal(trailingMatchCount('/a/b', '/a/b'), 3);
  assert.equal(trailingMatchCount('a\\b', 'x/a/b'), 2);
}

{
  // Best match last.
  const target = folder('/model/body/c00');
  const candidates = [folder('/motion/pump/c00'), folder('/motion/body/c00'), folder('/motion/body/c01')];
  assert.deepEqual(indices(rankFoldersByAffinity(target, candidates, () => true)), [2, 0, 1]);
}

{
  // Ties keep input order; rejected folders are dropped but keep their original index.
  const target = folder('/fighter/mario/model/body/c00');
  const candidates = [
    folder('/fighter/mario/motion/body/c00', { anims: 1 }),
    folder('/fighter/mario/model/body/c00'),
    folder('/fighter/luigi/motion/body/c01', { anims: 2 }),
    folder('/fighter/mario/motion/pump/c01', { anims: 1 }),
    folder('/fighter/mario/motion/body/c00', { anims: 1 })
  ];
  assert.deepEqual(indices(findAnimFolders(target, candidates)), [2, 3, 0, 4]);
}

{
  const target = folder('/fighter/mario/model/body/c00');
  const swingPrc: SwingPrc = { bones: [{ name: 'hair1' }] };
  const candidates = [
    folder('/fighter/mario/model/body/c00', { anims: 1 }),
    folder('/fighter/mario/motion/body/c00', { swingPrc }),
    folder('/fighter/luigi/model/body/c00', { swingPrc })
  ];
  assert.deepEqual(indices(findSwingFolders(target, candidates)), [1, 2]);
  assert.deepEqual(indices(findSwingFolders(target, [])), []);
}

{
  // Animation files that failed to parse still mark a folder as having animations.
  const target = folder('/model/body/c00');
  const broken: AffinityFolder = { model: modelFolder('/motion/body/c00', { anims: [unparsed('a.nuanmb')] }) };
  assert.deepEqual(indices(findAnimFolders(target, [broken])), [0]);
}

{
  assert.equal(folderDisplayName('/fighter/mario/motion/body/c00'), 'mario/motion/body/c00');
  assert.equal(folderDisplayName('C:\\mods\\fighter\\mario\\model\\body\\c00'), 'mario/model/body/c00');
  assert.equal(folderDisplayName('body/c00'), 'body/c00');
  assert.equal(folderEditorTitle('/fighter/mario/model/body/c00', 'model.numatb'), 'c00/model.numatb');
  assert.equal(folderEditorTitle('', 'model.numatb'), '/model.numatb');
}

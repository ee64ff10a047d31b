import assert from 'node:assert/strict';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { loadMaterialPresets } from '../src/adapters/files/materialPresets';
import { defaultMaterial, defaultPresets } from '../src/domain/material/presets';
import { parseMatlData, parseMatlEntry } from '../src/domain/material/parse';
import { RecordingLogger } from './fakes';

const makeTmpRoot = () => fs.mkdtempSync(path.join(os.tmpdir(), 'ssbh-check-presets-'));

{
  const tmpRoot = makeTmpRoot();
  try {
    const logger = new RecordingLogger();
    const presetsPath = path.join(tmpRoot, 'nested', 'presets.json');
    const presets = loadMaterialPresets(presetsPath, { logger });
    assert.deepEqual(presets, defaultPresets());
    assert.equal(fs.existsSync(presetsPath), true);
    const written: unknown = JSON.parse(fs.readFileSync(presetsPath, 'utf8'));
    const reparsed = parseMatlData(written);
    assert.equal(reparsed.ok, true);
    if (reparsed.ok) {
      assert.equal(reparsed.data.majorVersion, 1);
      assert.equal(reparsed.data.minorVersion, 6);
      assert.deepEqual(reparsed.data.entries, defaultPresets());
    }
    assert.deepEqual(logger.records, []);
  } finally {
    fs.rmSync(tmpRoot, { recursive: true, force: true });
  }
}

{
  const tmpRoot = makeTmpRoot();
  try {
    const logger = new RecordingLogger();
    const presetsPath = path.join(tmpRoot, 'presets.json');
    const custom = { ...defaultMaterial(), materialLabel: 'My Preset' };
    fs.writeFileSync(presetsPath, JSON.stringify({ entries: [custom] }), 'utf8');
    const presets = loadMaterialPresets(presetsPath, { logger });
    assert.deepEqual(presets, [custom]);
    assert.deepEqual(logger.records, []);
  } finally {
    fs.rmSync(tmpRoot, { recursive: true, force: true });
  }
}

{
  const tmpRoot = makeTmpRoot();
  try {
    const logger = new RecordingLogger();
    const presetsPath = path.join(tmpRoot, 'presets.json');
    fs.writeFileSync(presetsPath, '{ "entries": [', 'utf8');
    assert.deepEqual(loadMaterialPresets(presetsPath, { logger }), defaultPresets());
    assert.equal(logger.at('error').length, 1);
    assert.equal(logger.at('error')[0]?.message, `Failed to load presets from ${presetsPath}`);

    fs.writeFileSync(presetsPath, JSON.stringify({ entries: [{ materialLabel: 'broken' }] }), 'utf8');
    assert.deepEqual(loadMaterialPresets(presetsPath, { logger }), defaultPresets());
    assert.deepEqual(logger.at('error')[1]?.meta, { reason: 'Material entry #0 is malformed.' });
  } finally {
    fs.rmSync(tmpRoot, { recursive: true, force: true });
  }
}

{
  const tmpRoot = makeTmpRoot();
  try {
    // A file where the directory should be makes both the write and the read fail.
    const blocker = path.join(tmpRoot, 'blocker');
    fs.writeFileSync(blocker, '', 'utf8');
    const logger = new RecordingLogger();
    const presetsPath = path.join(blocker, 'presets.json');
    assert.deepEqual(loadMaterialPresets(presetsPath, { logger }), defaultPresets());
    assert.deepEqual(
      logger.at('error').map((record) => record.message),
      [`Failed to write default presets to ${presetsPath}`, `Failed to load presets from ${presetsPath}`]
    );
  } finally {
    fs.rmSync(tmpRoot, { recursive: true, force: true });
  }
}

{
  const entry = parseMatlEntry({
    materialLabel: 'a',
    shaderLabel: 'SFX_PBS_0100000008008269_opaque',
    booleans: [{ paramId: 'CustomBoolean1', data: true }],
    floats: [],
    vectors: [{ paramId: 'CustomVector0', data: [1, 0, 0, 1] }],
    textures: [{ paramId: 'Texture0', data: 'body_col' }],
    samplers: [
      {
        paramId: 'Sampler0',
        data: {
          wraps: 'ClampToEdge',
          wrapt: 'Repeat',
          wrapr: 'Repeat',
          minFilter: 'Nearest',
          magFilter: 'Linear',
          borderColor: [0, 0, 0, 1],
          lodBias: 0,
          maxAnisotropy: 'Two'
        }
      }
    ],
    blendStates: [],
    rasterizerStates: []
  });
  assert.equal(entry?.samplers[0]?.data.wraps, 'ClampToEdge');
  assert.equal(entry?.samplers[0]?.data.maxAnisotropy, 'Two');
  assert.deepEqual(entry?.vectors[0]?.data, [1, 0, 0, 1]);
}

{
  const base = { ...defaultMaterial() };
  assert.equal(parseMatlEntry({ ...base, vectors: [{ paramId: 'CustomVector0', data: [1, 2, 3] }] }), null);
  assert.equal(parseMatlEntry({ ...base, booleans: [{ paramId: 'CustomBoolean1', data: 1 }] }), null);
  assert.equal(parseMatlEntry({ ...base, shaderLabel: undefined }), null);
  assert.equal(parseMatlEntry({ ...base, blendStates: [{ paramId: 'BlendState0', data: { sourceColor: 'Two' } }] }), null);
  assert.equal(parseMatlEntry('entry'), null);
}

{
  const result = parseMatlData({ entries: 'none' });
  assert.equal(result.ok, false);
  if (!result.ok) {
    assert.equal(result.error.code, 'invalid_payload');
    assert.equal(result.error.message, 'Material document must be an object with an "entries" array.');
  }
}

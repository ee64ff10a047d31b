import assert from 'node:assert/strict';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import {
  accessedChannels,
  missingRequiredAttributes,
  programLookupKey,
  resolveProgram,
  splitParam
} from '../src/domain/shader/program';
import { ShaderDatabase, parseShaderDatabase } from '../src/domain/shader/database';
import { loadShaderDatabase } from '../src/adapters/files/shaderDatabaseFile';
import { SHADER_PLAIN, SHADER_UV, createShaderLookup, shaderPrograms } from './fakes';

const FIXTURE = path.join(__dirname, 'fixtures', 'shaderDatabase.json');
const makeTmpRoot = () => fs.mkdtempSync(path.join(os.tmpdir(), 'ssbh-check-shaders-'));

{
  assert.equal(programLookupKey('SFX_PBS_0100000008008269_opaque'), 'SFX_PBS_0100000008008269');
  assert.equal(programLookupKey('SFX_PBS_0100000008008269'), 'SFX_PBS_0100000008008269');
  assert.equal(programLookupKey('SFX_PBS_01'), '');
  assert.equal(programLookupKey(''), '');
}

{
  const lookup = createShaderLookup(shaderPrograms());
  assert.equal(resolveProgram(lookup, `${SHADER_UV}_sort`)?.vertexAttributes.join(','), 'map1,uvSet');
  assert.equal(resolveProgram(lookup, 'short_label'), undefined);
  assert.equal(resolveProgram(lookup, 'SFX_PBS_ffffffffffffffff_opaque'), undefined);
  // Short labels never reach the lookup.
  assert.deepEqual(lookup.calls, [SHADER_UV, 'SFX_PBS_ffffffffffffffff']);
}

{
  assert.deepEqual(splitParam('CustomVector11.xyz'), ['CustomVector11', 'xyz']);
  assert.deepEqual(splitParam('Texture0'), ['Texture0', '']);
  assert.deepEqual(splitParam('CustomVector3.'), ['CustomVector3', '']);
}

{
  const program = shaderPrograms()[SHADER_PLAIN];
  assert.deepEqual(accessedChannels(program, 'CustomVector0'), [true, false, false, true]);
  assert.deepEqual(accessedChannels(program, 'CustomVector8'), [true, true, true, true]);
  assert.deepEqual(accessedChannels(program, 'CustomVector1'), [false, false, false, false]);
}

{
  const program = shaderPrograms()[SHADER_UV];
  assert.deepEqual(missingRequiredAttributes(program, ['map1']), ['uvSet']);
  assert.deepEqual(missingRequiredAttributes(program, []), ['map1', 'uvSet']);
  assert.deepEqual(missingRequiredAttributes(program, ['uvSet', 'colorSet1', 'map1']), []);
}

{
  const database = new ShaderDatabase([
    { name: 'b_program', materialParameters: ['Texture0'], vertexAttributes: [], discard: false },
    { name: 'a_program', materialParameters: [], vertexAttributes: ['map1'], discard: true }
  ]);
  assert.equal(database.size, 2);
  assert.deepEqual(database.names(), ['a_program', 'b_program']);
  assert.equal(database.get('a_program')?.discard, true);
  assert.equal(database.get('missing'), undefined);
}

{
  const result = parseShaderDatabase({
    programs: [{ name: 'p', materialParameters: ['Texture0'], vertexAttributes: ['map1'] }]
  });
  assert.equal(result.ok, true);
  if (result.ok) {
    assert.deepEqual(result.data.get('p'), {
      materialParameters: ['Texture0'],
      vertexAttributes: ['map1'],
      discard: false
    });
  }
}

{
  const notObject = parseShaderDatabase([]);
  assert.equal(notObject.ok, false);
  if (!notObject.ok) {
    assert.equal(notObject.error.code, 'invalid_payload');
    assert.equal(notObject.error.message, 'Shader database must be a JSON object.');
  }

  const noPrograms = parseShaderDatabase({});
  assert.equal(noPrograms.ok, false);
  if (!noPrograms.ok) {
    assert.equal(noPrograms.error.message, 'Shader database must contain a "programs" array.');
  }

  const badProgram = parseShaderDatabase({
    programs: [
      { name: 'ok', materialParameters: [], vertexAttributes: [] },
      { name: 'bad', materialParameters: 'Texture0', vertexAttributes: [] }
    ]
  });
  assert.equal(badProgram.ok, false);
  if (!badProgram.ok) {
    assert.equal(badProgram.error.message, 'Shader program #1 must have a name, materialParameters and vertexAttributes.');
    assert.deepEqual(badProgram.error.details, { index: 1 });
  }
}

{
  const result = loadShaderDatabase(FIXTURE);
  assert.equal(result.ok, true);
  if (result.ok) {
    assert.equal(result.data.size, 2);
    assert.equal(resolveProgram(result.data, `${SHADER_UV}_opaque`)?.discard, true);
    assert.deepEqual(accessedChannels(result.data.get(SHADER_PLAIN) ?? shaderPrograms()[SHADER_PLAIN], 'CustomVector0'), [
      true,
      false,
      false,
      true
    ]);
  }
}

{
  const tmpRoot = makeTmpRoot();
  try {
    const missing = loadShaderDatabase(path.join(tmpRoot, 'missing.json'));
    assert.equal(missing.ok, false);
    if (!missing.ok) {
      assert.equal(missing.error.code, 'io_error');
      assert.match(missing.error.message, /^Failed to read shader database /);
    }

    const brokenPath = path.join(tmpRoot, 'broken.json');
    fs.writeFileSync(brokenPath, '{ "programs": [', 'utf8');
    const broken = loadShaderDatabase(brokenPath);
    assert.equal(broken.ok, false);
    if (!broken.ok) {
      assert.equal(broken.error.code, 'invalid_payload');
      assert.match(broken.error.message, /is not valid JSON/);
    }

    const wrongShapePath = path.join(tmpRoot, 'wrong.json');
    fs.writeFileSync(wrongShapePath, '{ "shaders": [] }', 'utf8');
    const wrongShape = loadShaderDatabase(wrongShapePath);
    assert.equal(wrongShape.ok, false);
    if (!wrongShape.ok) {
      assert.equal(wrongShape.error.code, 'invalid_payload');
      assert.deepEqual(wrongShape.error.details, { filePath: wrongShapePath });
    }
  } finally {
    fs.rmSync(tmpRoot, { recursive: true, force: true });
  }
}

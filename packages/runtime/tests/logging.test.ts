import assert from 'node:assert/strict';

import { ConsoleLogger, errorMessage, isLogLevel, safeFormatMeta, safeStringify } from '../src/logging';

const captureConsole = (run: () => void): string[] => {
  const lines: string[] = [];
  const original = { log: console.log, warn: console.warn, error: console.error };
  const record = (message?: unknown) => {
    lines.push(String(message ?? ''));
  };
  console.log = record;
  console.warn = record;
  console.error = record;
  try {
    run();
  } finally {
    console.log = original.log;
    console.warn = original.warn;
    console.error = original.error;
  }
  return lines;
};

{
  const longLabel = 'A'.repeat(600);
  const deep = { a: { b: { c: { d: { e: { f: { g: 1 } } } } } } };
  const manyKeys = Object.fromEntries(Array.from({ length: 45 }, (_, i) => [`k${i}`, i]));
  const manyItems = Array.from({ length: 45 }, (_, i) => i);
  const text = safeStringify({ longLabel, deep, manyKeys, manyItems });
  assert.match(text, /A{512}\.\.\.\[truncated\]/);
  assert.match(text, /\[MaxDepth\]/);
  assert.match(text, /_truncatedKeys":5/);
  assert.match(text, /\[\+25 more\]/);
}

{
  const circular: { self?: unknown } = {};
  circular.self = circular;
  assert.equal(safeStringify(circular), '{"self":"[Circular]"}');
}

{
  const text = safeStringify({ err: new Error('boom') });
  assert.match(text, /"name":"Error","message":"boom"/);
}

{
  const bad: Record<string, unknown> = {};
  Object.defineProperty(bad, 'boom', {
    enumerable: true,
    get: () => {
      throw new Error('explode');
    }
  });
  assert.equal(safeStringify(bad), '[unserializable meta: explode]');
}

{
  assert.equal(safeStringify({ text: 'x'.repeat(50) }, 20), '{"text":"xxxxxxxxxxx...[truncated]');
  assert.equal(safeFormatMeta(undefined), null);
  assert.equal(safeFormatMeta({ ok: true }), '{"ok":true}');
}

{
  assert.equal(errorMessage(new Error('failed')), 'failed');
  assert.equal(errorMessage('raw', 'fallback'), 'fallback');
  assert.equal(errorMessage('raw'), 'raw');
}

{
  assert.equal(isLogLevel('warn'), true);
  assert.equal(isLogLevel('WARN'), false);
}

{
  const lines = captureConsole(() => {
    const logger = new ConsoleLogger('unit', 'warn');
    logger.debug('debug');
    logger.info('info');
    logger.warn('warn', { entryIndex: 2 });
    logger.error('error');
  });
  assert.deepEqual(lines, ['[unit] [warn] warn {"entryIndex":2}', '[unit] [error] error']);
}

{
  let level: 'debug' | 'info' | 'warn' | 'error' = 'error';
  const lines = captureConsole(() => {
    const logger = new ConsoleLogger('dynamic', () => level);
    logger.warn('skip');
    level = 'debug';
    logger.debug('hit');
  });
  assert.deepEqual(lines, ['[dynamic] [debug] hit']);
}

import test from 'node:test';
import assert from 'node:assert/strict';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { DispatchLogger } from './logger.js';
import { EventBus } from './events/eventBus.js';
import type { DiagnosticEvent, DispatchLogEntry } from './types.js';

function quietLogger(options: ConstructorParameters<typeof DispatchLogger>[0] = {}): DispatchLogger {
  const log = new DispatchLogger({ colorLevel: 0, ...options });
  log.setConsoleOutputEnabled(false);
  return log;
}

const entry = (overrides: Partial<DispatchLogEntry>): DispatchLogEntry => ({
  id: 'e-1',
  timestamp: '2026-01-01T12:34:56.789Z',
  type: 'ROUND',
  content: 'round started',
  ...overrides,
});

test('format: time, type and content', () => {
  assert.equal(quietLogger().format(entry({})), '[12:34:56] [ROUND]: round started');
});

test('format: subscriber label and id', () => {
  const line = quietLogger().format(
    entry({ type: 'FAILED', content: 'boom', metadata: { subscriber: 'sub-2', label: 'mailer' } })
  );
  assert.equal(line, '[12:34:56] [FAILED] <mailer sub-2>: boom');
});

test('format: subscriber without label', () => {
  const line = quietLogger().format(entry({ type: 'TIMED_OUT', content: 'late', metadata: { subscriber: 'sub-9' } }));
  assert.equal(line, '[12:34:56] [TIMED_OUT] <sub-9>: late');
});

test('log: fills id and timestamp and keeps a copy', () => {
  const log = quietLogger();
  const full = log.log({ type: 'SYSTEM', content: 'hello' });

  assert.equal(typeof full.id, 'string');
  assert.ok(full.id.length > 0);
  assert.ok(!Number.isNaN(Date.parse(full.timestamp)));

  const logs = log.getLogs();
  assert.deepEqual(logs, [full]);
  logs.pop();
  assert.equal(log.getLogs().length, 1);
});

test('log: keeps only the most recent maxEntries', () => {
  const log = quietLogger({ maxEntries: 3 });
  for (let i = 1; i <= 5; i++) log.log({ type: 'SYSTEM', content: `m${i}` });

  assert.deepEqual(
    log.getLogs().map(e => e.content),
    ['m3', 'm4', 'm5']
  );
});

test('subscribe: subscribers are isolated from each other', () => {
  const log = quietLogger();
  const seen: string[] = [];
  log.subscribe(() => {
    throw new Error('bad sink');
  });
  log.subscribe(e => seen.push(e.content));

  log.log({ type: 'SYSTEM', content: 'one' });
  assert.deepEqual(seen, ['one']);
});

test('attach: forwards bus events until detached', () => {
  const log = quietLogger();
  const bus = new EventBus<DiagnosticEvent>();
  const detach = log.attach(bus);

  bus.emit({ type: 'ROUND', content: 'a' });
  detach();
  bus.emit({ type: 'ROUND', content: 'b' });

  assert.deepEqual(
    log.getLogs().map(e => e.content),
    ['a']
  );
});

test('setPersistenceFile: writes the log as JSON with errors flattened', () => {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'fanout-logger-'));
  const file = path.join(dir, 'nested', 'dispatch.json');
  const log = quietLogger();
  log.setPersistenceFile(file);

  log.log({ type: 'FAILED', content: 'boom', metadata: { error: new TypeError('bad') } });

  const written: unknown = JSON.parse(fs.readFileSync(file, 'utf-8'));
  assert.ok(Array.isArray(written));
  assert.equal(written.length, 1);
  assert.deepEqual(written[0].metadata, { error: { name: 'TypeError', message: 'bad' } });

  log.setPersistenceFile(null);
  log.log({ type: 'SYSTEM', content: 'not persisted' });
  assert.equal(JSON.parse(fs.readFileSync(file, 'utf-8')).length, 1);
});

test('console: DELIVERED lines need FANOUT_LOG_DELIVERIES', t => {
  const previous = process.env.FANOUT_LOG_DELIVERIES;
  delete process.env.FANOUT_LOG_DELIVERIES;
  t.after(() => {
    if (previous === undefined) delete process.env.FANOUT_LOG_DELIVERIES;
    else process.env.FANOUT_LOG_DELIVERIES = previous;
  });
  const consoleLog = t.mock.method(console, 'log', () => {});
  const log = new DispatchLogger({ colorLevel: 0 });

  log.log({ type: 'DELIVERED', content: 'quiet', metadata: { subscriber: 'sub-1' } });
  log.log({ type: 'FAILED', content: 'loud', metadata: { subscriber: 'sub-1' } });
  process.env.FANOUT_LOG_DELIVERIES = '1';
  log.log({ type: 'DELIVERED', content: 'now loud', metadata: { subscriber: 'sub-1' } });

  const printed = consoleLog.mock.calls.map(call => String(call.arguments[0]));
  assert.equal(printed.length, 2);
  assert.ok(printed[0]?.endsWith('[FAILED] <sub-1>: loud'));
  assert.ok(printed[1]?.endsWith('[DELIVERED] <sub-1>: now loud'));
});

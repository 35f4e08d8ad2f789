import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { FileStateStore, MemoryStateStore, asAppliedEntry, parseRecord } from '../core/state_store';
import { PersistenceError, RecordCorruptError } from '../core/errors';

const APPLIED_AT = '2026-03-04T05:06:07.000Z';

describe('FileStateStore', () => {
  let dir: string;
  let file: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'perf-tweaks-'));
    file = path.join(dir, 'nested', 'applied_tweaks.json');
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('treats an absent file as an empty record', async () => {
    const store = new FileStateStore(file);
    await store.load();

    expect(store.entries()).toEqual([]);
    expect(store.size).toBe(0);
    expect(fs.existsSync(file)).toBe(false);
  });

  it('creates the directory and writes two-space indented JSON', async () => {
    const store = new FileStateStore(file);
    await store.load();

    await store.put('game_mode_enable', { priorState: [1, 'x'], appliedAt: APPLIED_AT });

    expect(fs.readFileSync(file, 'utf-8')).toBe(
      '{\n' +
      '  "game_mode_enable": {\n' +
      '    "priorState": [\n' +
      '      1,\n' +
      '      "x"\n' +
      '    ],\n' +
      `    "appliedAt": "${APPLIED_AT}"\n` +
      '  }\n' +
      '}\n'
    );
    expect(fs.readdirSync(path.dirname(file))).toEqual(['applied_tweaks.json']);
  });

  it('round-trips an unmodified record', async () => {
    fs.mkdirSync(path.dirname(file), { recursive: true });
    const text = JSON.stringify({
      b_tweak: { priorState: { mode: 'Manual', running: true }, appliedAt: APPLIED_AT },
      a_tweak: { priorState: null, appliedAt: APPLIED_AT }
    }, null, 2) + '\n';
    fs.writeFileSync(file, text);

    const store = new FileStateStore(file);
    await store.load();
    await store.put('c_tweak', { priorState: 3, appliedAt: APPLIED_AT });
    await store.remove('c_tweak');

    expect(fs.readFileSync(file, 'utf-8')).toBe(text);
    expect(store.entries().map(([id]) => id)).toEqual(['b_tweak', 'a_tweak']);
  });

  it('keeps and reports foreign top-level keys', async () => {
    fs.mkdirSync(path.dirname(file), { recursive: true });
    fs.writeFileSync(file, JSON.stringify({
      applied: ['power_plan_high'],
      last_modified: '2025-11-30T10:00:00'
    }));

    const store = new FileStateStore(file);
    await store.load();
    await store.put('disable_nagle', { priorState: [], appliedAt: APPLIED_AT });

    expect(store.foreignKeys()).toEqual(['applied', 'last_modified']);
    expect(store.size).toBe(1);
    expect(JSON.parse(fs.readFileSync(file, 'utf-8'))).toEqual({
      applied: ['power_plan_high'],
      last_modified: '2025-11-30T10:00:00',
      disable_nagle: { priorState: [], appliedAt: APPLIED_AT }
    });
  });

  it('rejects a corrupt record', async () => {
    fs.mkdirSync(path.dirname(file), { recursive: true });
    fs.writeFileSync(file, '{ "tweak": ');

    await expect(new FileStateStore(file).load()).rejects.toThrow(RecordCorruptError);
  });

  it('rejects a record whose top level is not an object', async () => {
    fs.mkdirSync(path.dirname(file), { recursive: true });
    fs.writeFileSync(file, '["game_mode_enable"]');

    await expect(new FileStateStore(file).load()).rejects.toThrow('top level is not a JSON object');
  });

  it('refuses a record holding an integer it cannot keep exactly, and never rewrites it', async () => {
    fs.mkdirSync(path.dirname(file), { recursive: true });
    const text = '{\n  "future": {\n    "n": 12345678901234567890\n  }\n}\n';
    fs.writeFileSync(file, text);
    const store = new FileStateStore(file);

    await expect(store.load()).rejects.toThrow(
      `Applied-tweaks record "${file}" is corrupt: "future.n" holds an integer too large to keep exactly`
    );
    expect(fs.readFileSync(file, 'utf-8')).toBe(text);
  });

  it('keeps safe integers and fractions in foreign keys', async () => {
    fs.mkdirSync(path.dirname(file), { recursive: true });
    fs.writeFileSync(file, JSON.stringify({ future: { counts: [9007199254740991, 0.5] } }));
    const store = new FileStateStore(file);
    await store.load();

    await store.put('a_tweak', { priorState: null, appliedAt: APPLIED_AT });

    expect(JSON.parse(fs.readFileSync(file, 'utf-8')).future).toEqual({ counts: [9007199254740991, 0.5] });
  });

  it('leaves memory and disk unchanged when a write fails', async () => {
    // the record path is a directory, so the rename over it fails
    fs.mkdirSync(file, { recursive: true });
    const store = new FileStateStore(file);

    await expect(store.put('x', { priorState: 1, appliedAt: APPLIED_AT })).rejects.toThrow(PersistenceError);

    expect(store.has('x')).toBe(false);
    expect(fs.readdirSync(path.dirname(file))).toEqual(['applied_tweaks.json']);
  });
});

describe('MemoryStateStore', () => {
  it('moves a re-captured entry to the end', async () => {
    const store = new MemoryStateStore();
    await store.put('a', { priorState: 1, appliedAt: APPLIED_AT });
    await store.put('b', { priorState: 2, appliedAt: APPLIED_AT });
    await store.put('a', { priorState: 3, appliedAt: APPLIED_AT });

    expect(store.entries()).toEqual([
      ['b', { priorState: 2, appliedAt: APPLIED_AT }],
      ['a', { priorState: 3, appliedAt: APPLIED_AT }]
    ]);
  });

  it('throws on an injected write failure without changing state', async () => {
    const store = new MemoryStateStore({ a: { priorState: 1, appliedAt: APPLIED_AT } });
    await store.load();
    store.failNextWrite();

    await expect(store.remove('a')).rejects.toThrow('simulated write failure');
    expect(store.has('a')).toBe(true);
    expect(store.writes).toBe(0);

    await store.remove('a');
    expect(store.has('a')).toBe(false);
    expect(store.snapshot()).toEqual({});
  });

  it('does not write when removing an absent id', async () => {
    const store = new MemoryStateStore();
    await store.remove('missing');
    expect(store.writes).toBe(0);
  });
});

describe('record parsing', () => {
  it('recognises applied entries by shape', () => {
    expect(asAppliedEntry({ priorState: 0, appliedAt: APPLIED_AT })).toEqual({ priorState: 0, appliedAt: APPLIED_AT });
    expect(asAppliedEntry({ priorState: 0, appliedAt: 'yesterday' })).toBeUndefined();
    expect(asAppliedEntry({ appliedAt: APPLIED_AT })).toBeUndefined();
    expect(asAppliedEntry(['power_plan_high'])).toBeUndefined();
  });

  it('names the record in corruption errors', () => {
    expect(() => parseRecord('nope', 'C:\\state.json')).toThrow('Applied-tweaks record "C:\\state.json" is corrupt');
  });
});

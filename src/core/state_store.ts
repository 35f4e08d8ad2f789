/**
 * core/state_store.ts
 *
 * Persistence for the AppliedRecord: tweak id → { priorState, appliedAt }.
 *
 * The record is held as the raw JSON document so a load/save cycle never
 * loses anything. Top-level values that are not applied entries (another
 * catalog version's data, the legacy `{ "applied": [...] }` layout) are
 * "foreign": kept verbatim, written back on every save and reported.
 *
 * put() and remove() are write-through: the new document is persisted first
 * and only then becomes the in-memory state, so memory never runs ahead of
 * disk. A failed write throws PersistenceError and changes nothing.
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import { AppliedEntry, JsonValue } from './types';
import { PersistenceError, RecordCorruptError, errorMessage } from './errors';
import { scopedLogger } from './logger';

const log = scopedLogger('core/state_store');

type RecordDocument = Map<string, JsonValue>;

export interface StateStore {
  /** Read the persisted record. Absent ⇒ empty. Corrupt ⇒ RecordCorruptError. */
  load(): Promise<void>;
  /** Applied entries in insertion order. */
  entries(): Array<[string, AppliedEntry]>;
  get(id: string): AppliedEntry | undefined;
  has(id: string): boolean;
  put(id: string, entry: AppliedEntry): Promise<void>;
  remove(id: string): Promise<void>;
  /** Top-level keys that are not applied entries. */
  foreignKeys(): string[];
  readonly size: number;
}

// ---------------------------------------------------------------------------
// Entry recognition
// ---------------------------------------------------------------------------

function isJsonObject(value: JsonValue): value is { [key: string]: JsonValue } {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** An applied entry has a priorState and a parseable ISO-8601 appliedAt. */
export function asAppliedEntry(value: JsonValue): AppliedEntry | undefined {
  if (!isJsonObject(value)) return undefined;
  if (!('priorState' in value)) return undefined;
  const appliedAt = value.appliedAt;
  if (typeof appliedAt !== 'string' || Number.isNaN(Date.parse(appliedAt))) return undefined;
  return { priorState: value.priorState, appliedAt };
}

// ---------------------------------------------------------------------------
// Shared store logic
// ---------------------------------------------------------------------------

abstract class RecordStore implements StateStore {
  protected document: RecordDocument = new Map();

  /** Where errors say the record lives. */
  protected abstract readonly location: string;

  protected abstract read(): Promise<RecordDocument | undefined>;
  protected abstract write(document: RecordDocument): Promise<void>;

  async load(): Promise<void> {
    this.document = (await this.read()) ?? new Map();

    const foreign = this.foreignKeys();
    if (foreign.length > 0) {
      log.warn({ location: this.location, keys: foreign }, 'Record contains entries this version does not recognise — they are kept as-is');
    }
    log.debug({ location: this.location, applied: this.size }, 'Applied-tweaks record loaded');
  }

  entries(): Array<[string, AppliedEntry]> {
    const result: Array<[string, AppliedEntry]> = [];
    for (const [id, value] of this.document) {
      const entry = asAppliedEntry(value);
      if (entry) result.push([id, entry]);
    }
    return result;
  }

  get(id: string): AppliedEntry | undefined {
    const value = this.document.get(id);
    return value === undefined ? undefined : asAppliedEntry(value);
  }

  has(id: string): boolean {
    return this.get(id) !== undefined;
  }

  get size(): number {
    return this.entries().length;
  }

  foreignKeys(): string[] {
    return Array.from(this.document.entries())
      .filter(([, value]) => asAppliedEntry(value) === undefined)
      .map(([key]) => key);
  }

  async put(id: string, entry: AppliedEntry): Promise<void> {
    const next = new Map(this.document);
    // re-capturing moves the entry to the end: insertion order is capture order
    next.delete(id);
    next.set(id, { priorState: entry.priorState, appliedAt: entry.appliedAt });
    await this.commit(next);
  }

  async remove(id: string): Promise<void> {
    if (!this.document.has(id)) return;
    const next = new Map(this.document);
    next.delete(id);
    await this.commit(next);
  }

  private async commit(next: RecordDocument): Promise<void> {
    try {
      await this.write(next);
    } catch (e) {
      if (e instanceof PersistenceError) throw e;
      throw new PersistenceError(this.location, errorMessage(e));
    }
    this.document = next;
  }
}

export function serializeRecord(document: RecordDocument): string {
  return JSON.stringify(Object.fromEntries(document), null, 2) + '\n';
}

/** Path to the first integer JSON.parse could not hold exactly, if any. */
function findInexactInteger(value: JsonValue, at: string): string | undefined {
  if (typeof value === 'number') {
    return Number.isInteger(value) && !Number.isSafeInteger(value) ? at : undefined;
  }
  if (Array.isArray(value)) {
    for (let i = 0; i < value.length; i++) {
      const found = findInexactInteger(value[i], `${at}[${i}]`);
      if (found) return found;
    }
    return undefined;
  }
  if (isJsonObject(value)) {
    for (const [key, child] of Object.entries(value)) {
      const found = findInexactInteger(child, `${at}.${key}`);
      if (found) return found;
    }
  }
  return undefined;
}

/**
 * Parse record text. Anything but a JSON object is corruption, and so is an
 * integer beyond 2^53: saving it back would write a different number.
 */
export function parseRecord(text: string, location: string): RecordDocument {
  let parsed: JsonValue;
  try {
    parsed = JSON.parse(text);
  } catch (e) {
    throw new RecordCorruptError(location, `invalid JSON (${errorMessage(e)})`);
  }
  if (!isJsonObject(parsed)) {
    throw new RecordCorruptError(location, 'top level is not a JSON object');
  }
  for (const [key, value] of Object.entries(parsed)) {
    const inexact = findInexactInteger(value, key);
    if (inexact) {
      throw new RecordCorruptError(location, `"${inexact}" holds an integer too large to keep exactly`);
    }
  }
  return new Map(Object.entries(parsed));
}

// ---------------------------------------------------------------------------
// File-backed store
// ---------------------------------------------------------------------------

export class FileStateStore extends RecordStore {
  protected readonly location: string;

  constructor(private readonly filePath: string) {
    super();
    this.location = filePath;
  }

  protected async read(): Promise<RecordDocument | undefined> {
    let text: string;
    try {
      text = await fs.readFile(this.filePath, 'utf-8');
    } catch (e) {
      if (isErrnoException(e) && e.code === 'ENOENT') return undefined;
      throw new RecordCorruptError(this.filePath, `unreadable (${errorMessage(e)})`);
    }
    return parseRecord(text, this.filePath);
  }

  /** Write to a sibling temp file, then rename over the record. */
  protected async write(document: RecordDocument): Promise<void> {
    const tmpPath = `${this.filePath}.${process.pid}.tmp`;
    try {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true });
      await fs.writeFile(tmpPath, serializeRecord(document), 'utf-8');
      await fs.rename(tmpPath, this.filePath);
    } catch (e) {
      await fs.rm(tmpPath, { force: true }).catch(cleanupError => {
        log.warn({ tmpPath, error: errorMessage(cleanupError) }, 'Could not remove temp record file');
      });
      throw new PersistenceError(this.filePath, errorMessage(e));
    }
  }
}

function isErrnoException(e: unknown): e is NodeJS.ErrnoException {
  return e instanceof Error && 'code' in e;
}

// ---------------------------------------------------------------------------
// In-memory store
// ---------------------------------------------------------------------------

/**
 * Same contract, no disk. `failNextWrite()` makes the next put/remove throw
 * PersistenceError so callers can exercise their hard-stop path.
 */
export class MemoryStateStore extends RecordStore {
  protected readonly location = '<memory>';

  private persisted: string | undefined;
  private failuresPending = 0;

  /** Number of successful writes so far. */
  writes = 0;

  constructor(initial?: Record<string, JsonValue>) {
    super();
    this.persisted = initial === undefined ? undefined : serializeRecord(new Map(Object.entries(initial)));
  }

  failNextWrite(count = 1): void {
    this.failuresPending = count;
  }

  /** The document as it would sit on disk. */
  snapshot(): Record<string, JsonValue> {
    return this.persisted === undefined ? {} : Object.fromEntries(parseRecord(this.persisted, this.location));
  }

  protected async read(): Promise<RecordDocument | undefined> {
    return this.persisted === undefined ? undefined : parseRecord(this.persisted, this.location);
  }

  protected async write(document: RecordDocument): Promise<void> {
    if (this.failuresPending > 0) {
      this.failuresPending--;
      throw new PersistenceError(this.location, 'simulated write failure');
    }
    this.persisted = serializeRecord(document);
    this.writes++;
  }
}

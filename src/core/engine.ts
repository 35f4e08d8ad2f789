/**
 * core/engine.ts
 *
 * The TweakEngine runs apply and restore batches against the catalog, the
 * executor and the applied-tweaks record.
 *
 * Per id, in order:
 *   apply:   lookup → privilege check → tweak.apply() → record.put()
 *   restore: lookup → privilege check → tweak.undo()  → record.remove()
 *
 * One id's failure never stops or rolls back another. The exception is a
 * record write failure: continuing without a trustworthy record would lose
 * undo information, so the batch stops there and the rest is reported as
 * BATCH_ABORTED.
 *
 * Batches never overlap: apply() and restore() queue behind whatever batch
 * is already running.
 */

import {
  ActionExecutor,
  AppliedEntry,
  ApplyReport,
  ApplyResult,
  BatchOptions,
  EngineStatus,
  RestorePlan,
  RestoreReport,
  RestoreResult,
  PriorState,
  ReversibleTweak,
  TweakError,
  TweakResult,
  TweakStatus
} from './types';
import { TweakCatalog } from './catalog';
import { StateStore } from './state_store';
import { PrivilegeGate } from './privilege';
import {
  BatchAbortedError,
  NotReversibleError,
  UnknownTweakError,
  errorMessage,
  toTweakError
} from './errors';
import { scopedLogger } from './logger';

const log = scopedLogger('core/engine');

const PERSISTENCE_FAILURE = 'PERSISTENCE_FAILURE';

export interface TweakEngineDeps {
  catalog: TweakCatalog;
  executor: ActionExecutor;
  store: StateStore;
  privilege: PrivilegeGate;
  /** Source of appliedAt timestamps. */
  clock?: () => Date;
}

export class TweakEngine {
  readonly catalog: TweakCatalog;
  private readonly executor: ActionExecutor;
  private readonly store: StateStore;
  private readonly privilege: PrivilegeGate;
  private readonly clock: () => Date;

  /** Tail of the batch queue. */
  private queue: Promise<unknown> = Promise.resolve();

  constructor(deps: TweakEngineDeps) {
    this.catalog = deps.catalog;
    this.executor = deps.executor;
    this.store = deps.store;
    this.privilege = deps.privilege;
    this.clock = deps.clock ?? (() => new Date());
  }

  // -----------------------------------------------------------------------
  // Batches
  // -----------------------------------------------------------------------

  /**
   * Apply the selected tweaks. Known ids run in catalog order whatever the
   * selection order; ids the catalog does not define are reported
   * `not_found` after them. Duplicates are applied once.
   */
  apply(selectedIds: string[], options: BatchOptions<ApplyResult> = {}): Promise<ApplyReport> {
    return this.serialize(() => this.runApply(selectedIds, options));
  }

  /** Undo every recorded tweak, in the order the record captured them. */
  restore(options: BatchOptions<RestoreResult> = {}): Promise<RestoreReport> {
    return this.serialize(() => this.runRestore(options));
  }

  private serialize<T>(task: () => Promise<T>): Promise<T> {
    const run = this.queue.then(task, task);
    // the caller sees run's rejection; the queue only needs to know it settled
    this.queue = run.then(() => undefined, () => undefined);
    return run;
  }

  private async runApply(selectedIds: string[], options: BatchOptions<ApplyResult>): Promise<ApplyReport> {
    await this.store.load();

    const unique = Array.from(new Set(selectedIds));
    const known = unique
      .filter(id => this.catalog.has(id))
      .sort((a, b) => this.catalog.indexOf(a) - this.catalog.indexOf(b));
    const order = [...known, ...unique.filter(id => !this.catalog.has(id))];

    log.info({ count: order.length, ids: order }, 'Applying tweaks');

    const results: ApplyResult[] = [];
    let cancelled = false;
    let aborted = false;

    for (let i = 0; i < order.length; i++) {
      if (options.signal?.aborted) {
        cancelled = true;
        log.warn({ remaining: order.slice(i) }, 'Apply batch cancelled');
        break;
      }

      const result = await this.applyOne(order[i]);
      this.emit(results, result, options);

      if (result.error?.code === PERSISTENCE_FAILURE) {
        aborted = true;
        for (const id of order.slice(i + 1)) {
          const rest: ApplyResult = this.catalog.has(id)
            ? failed(id, toTweakError(new BatchAbortedError(id, PERSISTENCE_FAILURE)), 0)
            : { id, outcome: 'not_found', durationMs: 0 };
          this.emit(results, rest, options);
        }
        break;
      }
    }

    logSummary('apply', results);
    return { results, cancelled, aborted };
  }

  private async applyOne(id: string): Promise<ApplyResult> {
    const start = Date.now();
    const tweak = this.catalog.get(id);

    if (!tweak) {
      log.warn({ tweakId: id }, 'Not in catalog');
      return { id, outcome: 'not_found', durationMs: Date.now() - start };
    }

    if (tweak.requiresElevation && !this.privilege.isElevated()) {
      log.warn({ tweakId: id }, 'Skipped — requires administrator');
      return { id, outcome: 'skipped_insufficient_privilege', durationMs: Date.now() - start };
    }

    log.debug({ tweakId: id }, 'Applying');

    if (!tweak.reversible) {
      try {
        await tweak.apply(this.executor);
      } catch (e) {
        log.error({ tweakId: id, error: errorMessage(e) }, 'Apply failed');
        return failed(id, toTweakError(e), Date.now() - start);
      }
      log.info({ tweakId: id }, 'Applied (one-way, not recorded)');
      return { id, outcome: 'applied', durationMs: Date.now() - start };
    }

    let priorState: PriorState;
    try {
      priorState = await tweak.apply(this.executor);
    } catch (e) {
      log.error({ tweakId: id, error: errorMessage(e) }, 'Apply failed');
      return failed(id, toTweakError(e), Date.now() - start);
    }

    try {
      await this.store.put(id, { priorState, appliedAt: this.clock().toISOString() });
    } catch (e) {
      const rolledBack = await this.compensate(tweak, priorState);
      const error = toTweakError(e);
      log.error({ tweakId: id, error: error.message, rolledBack }, 'Applied but could not record — batch stops');
      return failed(id, { ...error, code: PERSISTENCE_FAILURE, details: { ...error.details, rolledBack } }, Date.now() - start);
    }

    log.info({ tweakId: id }, 'Applied');
    return { id, outcome: 'applied', durationMs: Date.now() - start };
  }

  /** Undo a change the record could not take, so nothing applied goes untracked. */
  private async compensate(tweak: ReversibleTweak, priorState: PriorState): Promise<boolean> {
    try {
      await tweak.undo(this.executor, priorState);
      return true;
    } catch (e) {
      log.error({ tweakId: tweak.id, error: errorMessage(e) }, 'Could not roll back unrecorded change');
      return false;
    }
  }

  private async runRestore(options: BatchOptions<RestoreResult>): Promise<RestoreReport> {
    await this.store.load();

    const entries = this.store.entries();
    if (entries.length === 0) {
      log.info('Nothing to restore');
      return { nothingToRestore: true, results: [], cancelled: false, aborted: false };
    }

    log.info({ count: entries.length, ids: entries.map(([id]) => id) }, 'Restoring tweaks');

    const results: RestoreResult[] = [];
    let cancelled = false;
    let aborted = false;

    for (let i = 0; i < entries.length; i++) {
      if (options.signal?.aborted) {
        cancelled = true;
        log.warn({ remaining: entries.slice(i).map(([id]) => id) }, 'Restore batch cancelled');
        break;
      }

      const [id, entry] = entries[i];
      const result = await this.restoreOne(id, entry);
      this.emit(results, result, options);

      if (result.error?.code === PERSISTENCE_FAILURE) {
        aborted = true;
        for (const [restId] of entries.slice(i + 1)) {
          this.emit(results, failed(restId, toTweakError(new BatchAbortedError(restId, PERSISTENCE_FAILURE)), 0), options);
        }
        break;
      }
    }

    logSummary('restore', results);
    return { nothingToRestore: false, results, cancelled, aborted };
  }

  private async restoreOne(id: string, entry: AppliedEntry): Promise<RestoreResult> {
    const start = Date.now();
    const tweak = this.catalog.get(id);

    // Stale entries stay in the record for a human to look at
    if (!tweak) {
      log.warn({ tweakId: id }, 'Recorded tweak is not in the catalog — entry kept');
      return failed(id, toTweakError(new UnknownTweakError(id)), Date.now() - start);
    }
    if (!tweak.reversible) {
      log.warn({ tweakId: id }, 'Recorded tweak is no longer reversible — entry kept');
      return failed(id, toTweakError(new NotReversibleError(id)), Date.now() - start);
    }

    if (tweak.requiresElevation && !this.privilege.isElevated()) {
      log.warn({ tweakId: id }, 'Skipped — requires administrator');
      return { id, outcome: 'skipped_insufficient_privilege', durationMs: Date.now() - start };
    }

    log.debug({ tweakId: id }, 'Restoring');

    try {
      await tweak.undo(this.executor, entry.priorState);
    } catch (e) {
      log.error({ tweakId: id, error: errorMessage(e) }, 'Restore failed — entry kept for retry');
      return failed(id, toTweakError(e), Date.now() - start);
    }

    try {
      await this.store.remove(id);
    } catch (e) {
      const error = toTweakError(e);
      log.error({ tweakId: id, error: error.message }, 'Restored but could not update record — batch stops');
      return failed(id, { ...error, code: PERSISTENCE_FAILURE }, Date.now() - start);
    }

    log.info({ tweakId: id }, 'Restored');
    return { id, outcome: 'restored', durationMs: Date.now() - start };
  }

  private emit<R extends TweakResult<string>>(results: R[], result: R, options: BatchOptions<R>): void {
    results.push(result);
    if (!options.onProgress) return;
    try {
      options.onProgress(result);
    } catch (e) {
      log.warn({ tweakId: result.id, error: errorMessage(e) }, 'Progress observer threw');
    }
  }

  // -----------------------------------------------------------------------
  // Read-only views
  // -----------------------------------------------------------------------

  /** Every catalog tweak with its applied state. One-way tweaks say so. */
  describe(): TweakStatus[] {
    const elevated = this.privilege.isElevated();
    return this.catalog.list().map(t => {
      const entry = this.store.get(t.id);
      return {
        id: t.id,
        name: t.name,
        description: t.description,
        category: t.category,
        requiresElevation: t.requiresElevation,
        reversible: t.reversible,
        applied: entry !== undefined,
        ...(entry ? { appliedAt: entry.appliedAt } : {}),
        blocked: t.requiresElevation && !elevated
      };
    });
  }

  /** What restore() would do right now, without doing it. */
  planRestore(): RestorePlan {
    const restorable: string[] = [];
    const unknown: string[] = [];
    for (const [id] of this.store.entries()) {
      const tweak = this.catalog.get(id);
      if (tweak?.reversible) restorable.push(id);
      else unknown.push(id);
    }
    const oneWay = this.catalog.list().filter(t => !t.reversible).map(t => t.id);
    return { restorable, unknown, oneWay };
  }

  status(): EngineStatus {
    return {
      elevated: this.privilege.isElevated(),
      appliedCount: this.store.size,
      foreignKeys: this.store.foreignKeys(),
      catalogSize: this.catalog.size
    };
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function failed(id: string, error: TweakError, durationMs: number): TweakResult<'failed'> {
  return { id, outcome: 'failed', error, durationMs };
}

function logSummary(batch: 'apply' | 'restore', results: Array<TweakResult<string>>): void {
  const counts: Record<string, number> = {};
  for (const r of results) {
    counts[r.outcome] = (counts[r.outcome] ?? 0) + 1;
  }
  log.info({ batch, total: results.length, ...counts }, 'Batch finished');
}

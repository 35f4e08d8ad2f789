/**
 * core/tweak_kinds.ts
 *
 * Turns a declarative TweakDefinition into a Tweak with apply/undo.
 * Adding a tweak to the catalog is a JSON entry of one of these kinds;
 * adding a new kind is one builder here plus its schema in catalog_loader.
 *
 * Multi-resource kinds are all-or-nothing: when a later write fails, the
 * writes already made for that tweak are reverted before the error is
 * rethrown, so a failed apply leaves the system as it found it.
 */

import {
  ActionExecutor,
  CacheClearDefinition,
  InterfaceSettingsDefinition,
  OneWayTweak,
  PowerSchemeDefinition,
  PriorState,
  ReversibleTweak,
  ServiceDefinition,
  ServiceState,
  SettingKey,
  SettingValue,
  SettingWrite,
  SettingsDefinition,
  Tweak,
  TweakDefinition
} from './types';
import { ExecutionError, errorMessage } from './errors';
import { scopedLogger } from './logger';

const log = scopedLogger('core/tweak_kinds');

// ---------------------------------------------------------------------------
// Prior-state shapes
// ---------------------------------------------------------------------------

type CapturedSetting = {
  path: string;
  name: string;
  previous: SettingValue | null;           // null: the value did not exist
};

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isSettingValue(value: unknown): value is SettingValue {
  return isObject(value) &&
    (value.type === 'DWord' || value.type === 'QWord' || value.type === 'String' || value.type === 'ExpandString') &&
    (typeof value.data === 'number' || typeof value.data === 'string');
}

function isCapturedSetting(value: unknown): value is CapturedSetting {
  return isObject(value) &&
    typeof value.path === 'string' &&
    typeof value.name === 'string' &&
    (value.previous === null || isSettingValue(value.previous));
}

function isServiceState(value: unknown): value is ServiceState {
  return isObject(value) &&
    (value.mode === 'Automatic' || value.mode === 'Manual' || value.mode === 'Disabled') &&
    typeof value.running === 'boolean';
}

function malformedPrior(tweakId: string, prior: PriorState): ExecutionError {
  return new ExecutionError('undo', `Recorded prior state for "${tweakId}" is malformed`, { tweakId, prior });
}

// ---------------------------------------------------------------------------
// Shared setting helpers
// ---------------------------------------------------------------------------

async function restoreSetting(executor: ActionExecutor, captured: CapturedSetting): Promise<void> {
  const key: SettingKey = { path: captured.path, name: captured.name };
  if (captured.previous === null) {
    await executor.deleteSetting(key);
  } else {
    await executor.writeSetting(key, captured.previous);
  }
}

/**
 * Capture every target value first, then write them in order.
 * A failed write reverts the earlier ones (newest first) and rethrows.
 */
async function applySettingWrites(
  tweakId: string,
  executor: ActionExecutor,
  writes: SettingWrite[]
): Promise<CapturedSetting[]> {
  const captured: CapturedSetting[] = [];
  for (const w of writes) {
    const previous = await executor.readSetting({ path: w.path, name: w.name });
    captured.push({ path: w.path, name: w.name, previous: previous ?? null });
  }

  for (let i = 0; i < writes.length; i++) {
    const w = writes[i];
    try {
      await executor.writeSetting({ path: w.path, name: w.name }, { type: w.type, data: w.value });
    } catch (e) {
      for (let j = i - 1; j >= 0; j--) {
        try {
          await restoreSetting(executor, captured[j]);
        } catch (rollbackError) {
          log.error(
            { tweakId, path: captured[j].path, name: captured[j].name, error: errorMessage(rollbackError) },
            'Rollback of partial apply failed'
          );
        }
      }
      throw e;
    }
  }

  return captured;
}

async function undoSettingWrites(tweakId: string, executor: ActionExecutor, prior: PriorState): Promise<void> {
  if (!Array.isArray(prior) || !prior.every(isCapturedSetting)) {
    throw malformedPrior(tweakId, prior);
  }
  // reverse order so overlapping writes end on the oldest value
  for (let i = prior.length - 1; i >= 0; i--) {
    await restoreSetting(executor, prior[i]);
  }
}

// ---------------------------------------------------------------------------
// Builders, one per kind
// ---------------------------------------------------------------------------

function settingsTweak(def: SettingsDefinition): ReversibleTweak {
  return {
    ...info(def),
    reversible: true,
    apply: executor => applySettingWrites(def.id, executor, def.writes),
    undo: (executor, prior) => undoSettingWrites(def.id, executor, prior)
  };
}

function interfaceSettingsTweak(def: InterfaceSettingsDefinition): ReversibleTweak {
  return {
    ...info(def),
    reversible: true,
    async apply(executor) {
      const subKeys = await executor.listSubKeys(def.parentPath);
      if (subKeys.length === 0) {
        throw new ExecutionError('listSubKeys', `No subkeys under ${def.parentPath}`, { tweakId: def.id });
      }
      const writes: SettingWrite[] = subKeys.flatMap(path =>
        def.writes.map(w => ({ path, name: w.name, type: w.type, value: w.value }))
      );
      return applySettingWrites(def.id, executor, writes);
    },
    undo: (executor, prior) => undoSettingWrites(def.id, executor, prior)
  };
}

function serviceTweak(def: ServiceDefinition): ReversibleTweak {
  return {
    ...info(def),
    reversible: true,
    async apply(executor) {
      const previous = await executor.readServiceMode(def.serviceName);
      if (!previous) {
        throw new ExecutionError('readServiceMode', `Service "${def.serviceName}" not found`, { tweakId: def.id });
      }

      const stopped = def.stop && previous.running;
      if (stopped) {
        await executor.stopService(def.serviceName);
      }
      try {
        await executor.setServiceMode(def.serviceName, def.mode);
      } catch (e) {
        if (stopped) {
          try {
            await executor.startService(def.serviceName);
          } catch (rollbackError) {
            log.error({ tweakId: def.id, error: errorMessage(rollbackError) }, 'Could not restart service after failed apply');
          }
        }
        throw e;
      }

      const prior: ServiceState = { mode: previous.mode, running: previous.running };
      return prior;
    },
    async undo(executor, prior) {
      if (!isServiceState(prior)) throw malformedPrior(def.id, prior);

      await executor.setServiceMode(def.serviceName, prior.mode);
      if (prior.running) {
        await executor.startService(def.serviceName);
      }
    }
  };
}

function powerSchemeTweak(def: PowerSchemeDefinition): ReversibleTweak {
  return {
    ...info(def),
    reversible: true,
    async apply(executor) {
      const previous = await executor.readActivePowerScheme();
      await executor.setActivePowerScheme(def.schemeGuid);
      return previous;
    },
    async undo(executor, prior) {
      if (typeof prior !== 'string') throw malformedPrior(def.id, prior);
      await executor.setActivePowerScheme(prior);
    }
  };
}

function cacheClearTweak(def: CacheClearDefinition): OneWayTweak {
  return {
    ...info(def),
    reversible: false,
    async apply(executor) {
      for (const path of def.paths) {
        await executor.clearCache(path);
      }
    }
  };
}

function info(def: TweakDefinition) {
  return {
    id: def.id,
    name: def.name,
    description: def.description,
    category: def.category,
    requiresElevation: def.requiresElevation
  };
}

export function buildTweak(def: TweakDefinition): Tweak {
  switch (def.kind) {
    case 'settings':          return settingsTweak(def);
    case 'interfaceSettings': return interfaceSettingsTweak(def);
    case 'service':           return serviceTweak(def);
    case 'powerScheme':       return powerSchemeTweak(def);
    case 'cacheClear':        return cacheClearTweak(def);
    default: {
      const unreachable: never = def;
      throw new ExecutionError('buildTweak', `Unsupported tweak kind in ${JSON.stringify(unreachable)}`);
    }
  }
}

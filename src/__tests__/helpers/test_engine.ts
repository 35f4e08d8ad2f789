import { TweakEngine } from '../../core/engine';
import { buildCatalog } from '../../core/catalog_loader';
import { MemoryStateStore } from '../../core/state_store';
import { StaticPrivilegeGate } from '../../core/privilege';
import { JsonValue } from '../../core/types';
import { RecordingExecutor } from './recording_executor';

export const TEST_NOW = '2026-01-02T03:04:05.000Z';

/** Two-tweak engine: one user-level setting, one admin-only setting. */
export function createTestEngine(options: { elevated?: boolean; initial?: Record<string, JsonValue> } = {}) {
  const executor = new RecordingExecutor().seedSetting('HKCU:\\Test', 'Mode', { type: 'DWord', data: 0 });
  const store = new MemoryStateStore(options.initial);
  const engine = new TweakEngine({
    catalog: buildCatalog([
      {
        id: 'user_tweak', kind: 'settings', name: 'User Tweak', description: 'Sets Mode to 1',
        category: 'System', requiresElevation: false,
        writes: [{ path: 'HKCU:\\Test', name: 'Mode', type: 'DWord', value: 1 }]
      },
      {
        id: 'admin_tweak', kind: 'settings', name: 'Admin Tweak', description: 'Sets Level to 2',
        category: 'Network', requiresElevation: true,
        writes: [{ path: 'HKLM:\\Test', name: 'Level', type: 'DWord', value: 2 }]
      }
    ]),
    executor,
    store,
    privilege: new StaticPrivilegeGate(options.elevated ?? false),
    clock: () => new Date(TEST_NOW)
  });
  return { engine, executor, store };
}

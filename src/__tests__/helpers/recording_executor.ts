/**
 * In-memory ActionExecutor. Holds a fake registry, service table, active
 * power scheme and cache directories; records every mutating call; can be
 * told to fail a specific call.
 */

import {
  ActionExecutor,
  ServiceMode,
  ServiceState,
  SettingKey,
  SettingValue
} from '../../core/types';
import { ExecutionError } from '../../core/errors';

export type Operation =
  | 'readSetting' | 'writeSetting' | 'deleteSetting' | 'listSubKeys'
  | 'readServiceMode' | 'setServiceMode' | 'startService' | 'stopService'
  | 'readActivePowerScheme' | 'setActivePowerScheme' | 'clearCache';

interface FailureRule {
  operation: Operation;
  /** Matches the setting name, service name, GUID or path of the call. */
  target?: string;
  remaining: number;
}

function settingId(key: SettingKey): string {
  return `${key.path}\\${key.name}`;
}

export class RecordingExecutor implements ActionExecutor {
  readonly settings = new Map<string, SettingValue>();
  readonly subKeys = new Map<string, string[]>();
  readonly services = new Map<string, ServiceState>();
  readonly caches = new Map<string, string[]>();
  activeScheme = '381b4222-f694-41f0-9685-ff5bb260df2e';

  /** Mutating calls in order, e.g. "writeSetting HKCU:\\X\\Y". */
  readonly calls: string[] = [];

  private failures: FailureRule[] = [];

  failOn(operation: Operation, target?: string, times = 1): this {
    this.failures.push({ operation, target, remaining: times });
    return this;
  }

  setting(path: string, name: string): SettingValue | undefined {
    return this.settings.get(settingId({ path, name }));
  }

  seedSetting(path: string, name: string, value: SettingValue): this {
    this.settings.set(settingId({ path, name }), value);
    return this;
  }

  private maybeFail(operation: Operation, target: string): void {
    const rule = this.failures.find(f =>
      f.operation === operation && f.remaining > 0 && (f.target === undefined || f.target === target));
    if (rule) {
      rule.remaining--;
      throw new ExecutionError(operation, `simulated failure on ${target}`);
    }
  }

  async readSetting(key: SettingKey): Promise<SettingValue | undefined> {
    this.maybeFail('readSetting', key.name);
    const value = this.settings.get(settingId(key));
    return value === undefined ? undefined : { ...value };
  }

  async writeSetting(key: SettingKey, value: SettingValue): Promise<void> {
    this.maybeFail('writeSetting', key.name);
    this.calls.push(`writeSetting ${settingId(key)}`);
    this.settings.set(settingId(key), { ...value });
  }

  async deleteSetting(key: SettingKey): Promise<void> {
    this.maybeFail('deleteSetting', key.name);
    this.calls.push(`deleteSetting ${settingId(key)}`);
    this.settings.delete(settingId(key));
  }

  async listSubKeys(path: string): Promise<string[]> {
    this.maybeFail('listSubKeys', path);
    return [...(this.subKeys.get(path) ?? [])];
  }

  async readServiceMode(name: string): Promise<ServiceState | undefined> {
    this.maybeFail('readServiceMode', name);
    const state = this.services.get(name);
    return state === undefined ? undefined : { ...state };
  }

  async setServiceMode(name: string, mode: ServiceMode): Promise<void> {
    this.maybeFail('setServiceMode', name);
    this.calls.push(`setServiceMode ${name} ${mode}`);
    const state = this.services.get(name);
    if (!state) throw new ExecutionError('setServiceMode', `no service ${name}`);
    state.mode = mode;
  }

  async startService(name: string): Promise<void> {
    this.maybeFail('startService', name);
    this.calls.push(`startService ${name}`);
    const state = this.services.get(name);
    if (!state) throw new ExecutionError('startService', `no service ${name}`);
    state.running = true;
  }

  async stopService(name: string): Promise<void> {
    this.maybeFail('stopService', name);
    this.calls.push(`stopService ${name}`);
    const state = this.services.get(name);
    if (!state) throw new ExecutionError('stopService', `no service ${name}`);
    state.running = false;
  }

  async readActivePowerScheme(): Promise<string> {
    this.maybeFail('readActivePowerScheme', this.activeScheme);
    return this.activeScheme;
  }

  async setActivePowerScheme(guid: string): Promise<void> {
    this.maybeFail('setActivePowerScheme', guid);
    this.calls.push(`setActivePowerScheme ${guid}`);
    this.activeScheme = guid;
  }

  async clearCache(path: string): Promise<void> {
    this.maybeFail('clearCache', path);
    this.calls.push(`clearCache ${path}`);
    this.caches.set(path, []);
  }
}

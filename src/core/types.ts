/**
 * core/types.ts
 *
 * Engine, catalog and record types shared across modules. Transport wire
 * shapes live beside their transport.
 */

// ---------------------------------------------------------------------------
// JSON values (what the record file can hold)
// ---------------------------------------------------------------------------

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };

/** Opaque capture of what a reversible tweak overwrote. Only the tweak reads it. */
export type PriorState = JsonValue;

// ---------------------------------------------------------------------------
// Session configuration
// ---------------------------------------------------------------------------

export type TransportMode = 'cli' | 'stdio' | 'http';
export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

export interface SessionConfig {
  transportMode: TransportMode;
  port: number;                            // HTTP only
  logLevel: LogLevel;
  stateFile: string;                       // AppliedRecord location
  catalogFile: string;                     // ordered tweak definitions
  powershellTimeoutMs: number;             // per PowerShell invocation
}

// ---------------------------------------------------------------------------
// ActionExecutor: the primitive resource operations tweaks are built from
// ---------------------------------------------------------------------------

export type SettingType = 'DWord' | 'QWord' | 'String' | 'ExpandString';

export interface SettingKey {
  path: string;                            // e.g. "HKCU:\\System\\GameConfigStore"
  name: string;                            // value name under that key
}

// type aliases (not interfaces) so captures stay assignable to JsonValue
export type SettingValue = {
  type: SettingType;
  data: number | string;                   // QWORDs read back as decimal strings
};

export type ServiceMode = 'Automatic' | 'Manual' | 'Disabled';

export type ServiceState = {
  mode: ServiceMode;
  running: boolean;
};

/**
 * Capability set the engine calls through. Every call is awaited before the
 * next one starts; a single call either fully succeeds or throws.
 * "Not found" is modelled as `undefined`, never as an error.
 */
export interface ActionExecutor {
  readSetting(key: SettingKey): Promise<SettingValue | undefined>;
  writeSetting(key: SettingKey, value: SettingValue): Promise<void>;
  deleteSetting(key: SettingKey): Promise<void>;
  listSubKeys(path: string): Promise<string[]>;

  readServiceMode(name: string): Promise<ServiceState | undefined>;
  setServiceMode(name: string, mode: ServiceMode): Promise<void>;
  startService(name: string): Promise<void>;
  stopService(name: string): Promise<void>;

  readActivePowerScheme(): Promise<string>;
  setActivePowerScheme(guid: string): Promise<void>;

  /** One-way: removes the contents of a cache directory. */
  clearCache(path: string): Promise<void>;
}

// ---------------------------------------------------------------------------
// Tweak model
// ---------------------------------------------------------------------------

export const CATEGORIES = ['System', 'Network', 'Graphics'] as const;
export type TweakCategory = typeof CATEGORIES[number];

interface TweakInfo {
  /** Persistence key. Never reused for a semantically different tweak. */
  id: string;
  name: string;
  description: string;
  category: TweakCategory;
  requiresElevation: boolean;
}

export interface ReversibleTweak extends TweakInfo {
  reversible: true;
  apply(executor: ActionExecutor): Promise<PriorState>;
  undo(executor: ActionExecutor, prior: PriorState): Promise<void>;
}

export interface OneWayTweak extends TweakInfo {
  reversible: false;
  apply(executor: ActionExecutor): Promise<void>;
}

export type Tweak = ReversibleTweak | OneWayTweak;

// ---------------------------------------------------------------------------
// Tweak definitions (config/catalog.json): declarative data per kind
// ---------------------------------------------------------------------------

export interface SettingWrite extends SettingKey {
  type: SettingType;
  value: number | string;
}

interface DefinitionBase {
  id: string;
  name: string;
  description: string;
  category: TweakCategory;
  requiresElevation: boolean;
}

export interface SettingsDefinition extends DefinitionBase {
  kind: 'settings';
  writes: SettingWrite[];
}

export interface InterfaceSettingsDefinition extends DefinitionBase {
  kind: 'interfaceSettings';
  parentPath: string;                      // every subkey of this key gets the writes
  writes: Array<{ name: string; type: SettingType; value: number | string }>;
}

export interface ServiceDefinition extends DefinitionBase {
  kind: 'service';
  serviceName: string;
  mode: ServiceMode;
  stop: boolean;                           // also stop it if it is running
}

export interface PowerSchemeDefinition extends DefinitionBase {
  kind: 'powerScheme';
  schemeGuid: string;
}

export interface CacheClearDefinition extends DefinitionBase {
  kind: 'cacheClear';
  paths: string[];                         // may contain %VAR% references
}

export type TweakDefinition =
  | SettingsDefinition
  | InterfaceSettingsDefinition
  | ServiceDefinition
  | PowerSchemeDefinition
  | CacheClearDefinition;

// ---------------------------------------------------------------------------
// AppliedRecord
// ---------------------------------------------------------------------------

export interface AppliedEntry {
  priorState: PriorState;
  appliedAt: string;                       // ISO-8601
}

// ---------------------------------------------------------------------------
// Batch results: what apply() / restore() return
// ---------------------------------------------------------------------------

export interface TweakError {
  code: string;                            // maps to our error taxonomy (see errors.ts)
  message: string;
  details?: Record<string, unknown>;
}

export type ApplyOutcome = 'applied' | 'skipped_insufficient_privilege' | 'failed' | 'not_found';
export type RestoreOutcome = 'restored' | 'skipped_insufficient_privilege' | 'failed';

export interface TweakResult<O extends string> {
  id: string;
  outcome: O;
  error?: TweakError;                      // present only when outcome is 'failed'
  durationMs: number;
}

export type ApplyResult = TweakResult<ApplyOutcome>;
export type RestoreResult = TweakResult<RestoreOutcome>;

export interface ApplyReport {
  results: ApplyResult[];
  cancelled: boolean;                      // stopped by the caller's AbortSignal
  aborted: boolean;                        // stopped by a persistence failure
}

export interface RestoreReport {
  nothingToRestore: boolean;
  results: RestoreResult[];
  cancelled: boolean;
  aborted: boolean;
}

export interface BatchOptions<R> {
  /** Called once per completed id, in report order. */
  onProgress?: (result: R) => void;
  /** Checked before each id; an in-flight executor call is never interrupted. */
  signal?: AbortSignal;
}

// ---------------------------------------------------------------------------
// Read-only views for menus and transports
// ---------------------------------------------------------------------------

export interface TweakStatus {
  id: string;
  name: string;
  description: string;
  category: TweakCategory;
  requiresElevation: boolean;
  reversible: boolean;
  applied: boolean;
  appliedAt?: string;
  blocked: boolean;                        // needs elevation the process does not have
}

export interface RestorePlan {
  restorable: string[];
  unknown: string[];                       // recorded ids the catalog no longer defines
  oneWay: string[];                        // catalog tweaks restore never touches
}

export interface EngineStatus {
  elevated: boolean;
  appliedCount: number;
  foreignKeys: string[];
  catalogSize: number;
}

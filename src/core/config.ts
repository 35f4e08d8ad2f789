/**
 * core/config.ts
 *
 * Session configuration. Sources, highest precedence first:
 *   1. CLI flags (--transport, --port)
 *   2. Environment (.env is loaded into it by server.ts)
 *   3. config/settings.json
 *   4. Built-in defaults
 *
 * The merged result is validated as a whole; anything invalid is a
 * ConfigError and startup stops. Nothing falls back to a guessed default.
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import Ajv from 'ajv';
import { SessionConfig, TransportMode } from './types';
import { ConfigError, errorMessage } from './errors';

const ajv = new Ajv({ allErrors: true });

const TRANSPORTS: readonly TransportMode[] = ['cli', 'stdio', 'http'];

const properties = {
  transportMode:       { enum: TRANSPORTS },
  port:                { type: 'integer', minimum: 0, maximum: 65535 },
  logLevel:            { enum: ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'] },
  stateFile:           { type: 'string', minLength: 1 },
  catalogFile:         { type: 'string', minLength: 1 },
  powershellTimeoutMs: { type: 'integer', minimum: 1 }
};

/** settings.json: any subset of the session keys, nothing else. */
const validateSettingsFile = ajv.compile<Partial<SessionConfig>>({
  type: 'object',
  properties,
  additionalProperties: false
});

const validateSession = ajv.compile<SessionConfig>({
  type: 'object',
  properties,
  required: Object.keys(properties),
  additionalProperties: false
});

// ---------------------------------------------------------------------------
// CLI arguments
// ---------------------------------------------------------------------------

export interface CliOptions {
  /** First positional argument. */
  command?: string;
  /** Remaining positional arguments. */
  ids: string[];
  all: boolean;
  json: boolean;
  transport?: TransportMode;
  port?: number;
}

function isTransportMode(value: string): value is TransportMode {
  return TRANSPORTS.some(t => t === value);
}

export function parseCli(argv: string[]): CliOptions {
  const options: CliOptions = { ids: [], all: false, json: false };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case '--all':
        options.all = true;
        break;
      case '--json':
        options.json = true;
        break;
      case '--transport': {
        const value = argv[++i];
        if (value === undefined || !isTransportMode(value)) {
          throw new ConfigError(`--transport expects one of ${TRANSPORTS.join(', ')}`, { value });
        }
        options.transport = value;
        break;
      }
      case '--port': {
        const value = argv[++i];
        options.port = parsePort(value, '--port');
        break;
      }
      default:
        if (arg.startsWith('--')) {
          throw new ConfigError(`Unknown option ${arg}`, { option: arg });
        }
        if (options.command === undefined) options.command = arg;
        else options.ids.push(arg);
    }
  }

  return options;
}

function parsePort(value: string | undefined, source: string): number {
  const port = value === undefined ? NaN : Number(value);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new ConfigError(`${source} must be a port number, got "${value ?? ''}"`, { source, value });
  }
  return port;
}

function parseInteger(value: string, source: string): number {
  const n = Number(value);
  if (!Number.isInteger(n)) {
    throw new ConfigError(`${source} must be an integer, got "${value}"`, { source, value });
  }
  return n;
}

// ---------------------------------------------------------------------------
// Session config
// ---------------------------------------------------------------------------

/** %APPDATA%\PerfTweaks\applied_tweaks.json, or under the home directory. */
export function defaultStateFile(env: NodeJS.ProcessEnv = process.env): string {
  const base = env.APPDATA || os.homedir();
  return path.join(base, 'PerfTweaks', 'applied_tweaks.json');
}

function readSettingsFile(settingsFile: string): Partial<SessionConfig> {
  if (!fs.existsSync(settingsFile)) return {};

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(settingsFile, 'utf-8'));
  } catch (e) {
    throw new ConfigError(`Settings file ${settingsFile} is not valid JSON: ${errorMessage(e)}`, { file: settingsFile });
  }

  if (!validateSettingsFile(raw)) {
    throw new ConfigError(`Settings file ${settingsFile} failed validation`, {
      file: settingsFile,
      violations: (validateSettingsFile.errors ?? []).map(e => `${e.instancePath || '/'} ${e.message ?? 'is invalid'}`)
    });
  }
  return raw;
}

function fromEnv(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const values: Record<string, unknown> = {};
  if (env.PERF_TWEAKS_STATE_FILE) values.stateFile = env.PERF_TWEAKS_STATE_FILE;
  if (env.PERF_TWEAKS_CATALOG) values.catalogFile = env.PERF_TWEAKS_CATALOG;
  if (env.LOG_LEVEL) values.logLevel = env.LOG_LEVEL;
  if (env.PERF_TWEAKS_PS_TIMEOUT_MS) {
    values.powershellTimeoutMs = parseInteger(env.PERF_TWEAKS_PS_TIMEOUT_MS, 'PERF_TWEAKS_PS_TIMEOUT_MS');
  }
  if (env.PORT) values.port = parsePort(env.PORT, 'PORT');
  return values;
}

export interface LoadConfigOptions {
  cli?: Pick<CliOptions, 'transport' | 'port'>;
  env?: NodeJS.ProcessEnv;
  /** Directory holding settings.json and catalog.json. */
  configDir?: string;
}

export function loadSessionConfig(options: LoadConfigOptions = {}): SessionConfig {
  const env = options.env ?? process.env;
  const configDir = options.configDir ?? path.resolve(process.cwd(), 'config');
  const cli = options.cli ?? {};

  const defaults: SessionConfig = {
    transportMode: 'cli',
    port: 3000,
    logLevel: 'info',
    stateFile: defaultStateFile(env),
    catalogFile: path.join(configDir, 'catalog.json'),
    powershellTimeoutMs: 60000
  };

  const merged: Record<string, unknown> = {
    ...defaults,
    ...readSettingsFile(path.join(configDir, 'settings.json')),
    ...fromEnv(env),
    ...(cli.transport !== undefined ? { transportMode: cli.transport } : {}),
    ...(cli.port !== undefined ? { port: cli.port } : {})
  };

  if (!validateSession(merged)) {
    throw new ConfigError('Session configuration is invalid', {
      violations: (validateSession.errors ?? []).map(e => `${e.instancePath || '/'} ${e.message ?? 'is invalid'}`)
    });
  }

  return {
    ...merged,
    stateFile: path.resolve(merged.stateFile),
    catalogFile: path.resolve(merged.catalogFile)
  };
}

/**
 * tools/powershell_executor.ts
 *
 * ActionExecutor backed by PowerShell cmdlets (Get-Item, New-ItemProperty,
 * Set-Service, powercfg …). Each method runs exactly one script, so each
 * call touches exactly one resource.
 *
 * DWORD values are reported unsigned (0xFFFFFFFF reads as 4294967295) and
 * converted back to the signed Int32 the registry provider expects on write.
 * QWORD values are reported as decimal strings so no digit is lost.
 */

import {
  ActionExecutor,
  ServiceMode,
  ServiceState,
  SettingKey,
  SettingType,
  SettingValue
} from '../core/types';
import { ExecutionError } from '../core/errors';
import { scopedLogger } from '../core/logger';
import { psQuote, runPowerShell } from './powershell';

const log = scopedLogger('tools/powershell_executor');

const SETTING_TYPES: readonly SettingType[] = ['DWord', 'QWord', 'String', 'ExpandString'];
const SERVICE_MODES: readonly ServiceMode[] = ['Automatic', 'Manual', 'Disabled'];
const GUID_RE = /[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}/i;
const GUID_ONLY_RE = new RegExp(`^${GUID_RE.source}$`, 'i');

// ---------------------------------------------------------------------------
// Output parsing
// ---------------------------------------------------------------------------

function parseJson(raw: string, operation: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    throw new ExecutionError(operation, 'Unexpected PowerShell output', { raw });
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isSettingType(value: unknown): value is SettingType {
  return SETTING_TYPES.some(t => t === value);
}

function isServiceMode(value: unknown): value is ServiceMode {
  return SERVICE_MODES.some(m => m === value);
}

const DWORD_MAX = 4294967295;
const DECIMAL_RE = /^-?[0-9]+$/;

/**
 * Render a SettingValue as a PowerShell expression of the right .NET type.
 * Data that does not fit its type throws rather than being coerced.
 */
function psValue(value: SettingValue, key: SettingKey): string {
  const { type, data } = value;
  const invalid = () => new ExecutionError(
    'writeSetting',
    `Invalid ${type} data for ${key.path}\\${key.name}: ${JSON.stringify(data)}`,
    { type, data }
  );

  switch (type) {
    case 'DWord':
      if (typeof data !== 'number' || !Number.isInteger(data) || data < 0 || data > DWORD_MAX) throw invalid();
      // the registry provider takes DWORDs as Int32
      return `([int32]${data | 0})`;
    case 'QWord':
      // decimal strings carry values past 2^53 exactly
      if (typeof data === 'string' && DECIMAL_RE.test(data)) return `([int64]'${data}')`;
      if (typeof data !== 'number' || !Number.isSafeInteger(data)) throw invalid();
      return `([int64]${data})`;
    default:
      if (typeof data !== 'string') throw invalid();
      return psQuote(data);
  }
}

function keyPreamble(key: SettingKey): string {
  return `$p = ${psQuote(key.path)}; $n = ${psQuote(key.name)};`;
}

// ---------------------------------------------------------------------------
// Executor
// ---------------------------------------------------------------------------

export class PowerShellExecutor implements ActionExecutor {
  constructor(private readonly timeoutMs = 60000) {}

  private run(script: string, operation: string): string {
    log.debug({ operation }, 'Running PowerShell');
    return runPowerShell(script, operation, this.timeoutMs);
  }

  async readSetting(key: SettingKey): Promise<SettingValue | undefined> {
    const raw = this.run(`
      ${keyPreamble(key)}
      if (-not (Test-Path -LiteralPath $p)) { 'null'; return }
      $k = Get-Item -LiteralPath $p;
      if ($k.GetValueNames() -notcontains $n) { 'null'; return }
      $kind = $k.GetValueKind($n).ToString();
      $v = $k.GetValue($n, $null, 'DoNotExpandEnvironmentNames');
      if ($kind -eq 'DWord') { $v = [BitConverter]::ToUInt32([BitConverter]::GetBytes([int32]$v), 0) }
      if ($kind -eq 'QWord') { $v = [string]$v }
      [PSCustomObject]@{ type = $kind; data = $v } | ConvertTo-Json -Compress;
    `, 'readSetting');

    const parsed = parseJson(raw, 'readSetting');
    if (parsed === null) return undefined;

    if (!isRecord(parsed) || !isSettingType(parsed.type) ||
        (typeof parsed.data !== 'number' && typeof parsed.data !== 'string')) {
      throw new ExecutionError('readSetting', `Unsupported registry value at ${key.path}\\${key.name}`, { raw });
    }
    return { type: parsed.type, data: parsed.data };
  }

  async writeSetting(key: SettingKey, value: SettingValue): Promise<void> {
    this.run(`
      ${keyPreamble(key)}
      if (-not (Test-Path -LiteralPath $p)) { New-Item -Path $p -Force | Out-Null }
      New-ItemProperty -LiteralPath $p -Name $n -Value ${psValue(value, key)} -PropertyType ${value.type} -Force | Out-Null;
    `, 'writeSetting');
  }

  async deleteSetting(key: SettingKey): Promise<void> {
    this.run(`
      ${keyPreamble(key)}
      if (-not (Test-Path -LiteralPath $p)) { return }
      if ((Get-Item -LiteralPath $p).GetValueNames() -notcontains $n) { return }
      Remove-ItemProperty -LiteralPath $p -Name $n;
    `, 'deleteSetting');
  }

  async listSubKeys(path: string): Promise<string[]> {
    const raw = this.run(`
      $p = ${psQuote(path)};
      if (-not (Test-Path -LiteralPath $p)) { '[]'; return }
      ConvertTo-Json -Compress -InputObject @(Get-ChildItem -LiteralPath $p | ForEach-Object { 'Registry::' + $_.Name });
    `, 'listSubKeys');

    const parsed = parseJson(raw, 'listSubKeys');
    if (!Array.isArray(parsed) || !parsed.every((p): p is string => typeof p === 'string')) {
      throw new ExecutionError('listSubKeys', `Unexpected subkey listing for ${path}`, { raw });
    }
    return parsed;
  }

  async readServiceMode(name: string): Promise<ServiceState | undefined> {
    const raw = this.run(`
      $s = Get-Service -Name ${psQuote(name)} -ErrorAction SilentlyContinue;
      if (-not $s) { 'null'; return }
      [PSCustomObject]@{ mode = $s.StartType.ToString(); running = ($s.Status -eq 'Running') } | ConvertTo-Json -Compress;
    `, 'readServiceMode');

    const parsed = parseJson(raw, 'readServiceMode');
    if (parsed === null) return undefined;

    if (!isRecord(parsed) || !isServiceMode(parsed.mode) || typeof parsed.running !== 'boolean') {
      throw new ExecutionError('readServiceMode', `Unsupported start mode for service ${name}`, { raw });
    }
    return { mode: parsed.mode, running: parsed.running };
  }

  async setServiceMode(name: string, mode: ServiceMode): Promise<void> {
    this.run(`Set-Service -Name ${psQuote(name)} -StartupType ${mode};`, 'setServiceMode');
  }

  async startService(name: string): Promise<void> {
    this.run(`Start-Service -Name ${psQuote(name)};`, 'startService');
  }

  async stopService(name: string): Promise<void> {
    this.run(`Stop-Service -Name ${psQuote(name)} -Force;`, 'stopService');
  }

  async readActivePowerScheme(): Promise<string> {
    const raw = this.run(`
      $out = powercfg /getactivescheme;
      if ($LASTEXITCODE -ne 0) { throw "powercfg exited with $LASTEXITCODE" }
      $out;
    `, 'readActivePowerScheme');

    const match = GUID_RE.exec(raw);
    if (!match) {
      throw new ExecutionError('readActivePowerScheme', 'No scheme GUID in powercfg output', { raw });
    }
    return match[0].toLowerCase();
  }

  async setActivePowerScheme(guid: string): Promise<void> {
    if (!GUID_ONLY_RE.test(guid)) {
      throw new ExecutionError('setActivePowerScheme', `Not a power scheme GUID: "${guid}"`);
    }
    this.run(`
      powercfg /setactive ${psQuote(guid)};
      if ($LASTEXITCODE -ne 0) { throw "powercfg exited with $LASTEXITCODE" }
    `, 'setActivePowerScheme');
  }

  async clearCache(path: string): Promise<void> {
    // Files held open by a running driver are skipped and counted, not fatal
    const raw = this.run(`
      $p = [Environment]::ExpandEnvironmentVariables(${psQuote(path)});
      if (-not (Test-Path -LiteralPath $p)) { '0'; return }
      $failed = @();
      Get-ChildItem -LiteralPath $p -Force | Remove-Item -Recurse -Force -ErrorAction SilentlyContinue -ErrorVariable +failed;
      $failed.Count;
    `, 'clearCache');

    const skipped = Number.parseInt(raw, 10);
    if (skipped > 0) {
      log.warn({ path, skipped }, 'Some cache entries were in use and left in place');
    }
  }
}

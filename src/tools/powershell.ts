/**
 * tools/powershell.ts
 *
 * Runs a PowerShell script synchronously and returns its trimmed stdout.
 * Scripts are passed with -EncodedCommand (Base64 UTF-16LE) so nothing in
 * them needs shell escaping; literals inside the script go through psQuote().
 */

import { execSync } from 'child_process';
import { AccessDeniedError, ExecutionError, TimeoutError } from '../core/errors';

const ACCESS_DENIED_PATTERNS = [
  /access is denied/i,
  /requested registry access is not allowed/i,
  /UnauthorizedAccessException/,
  /PermissionDenied/
];

interface ExecFailure {
  message: string;
  code?: string;
  stderr?: Buffer | string;
}

function isExecFailure(e: unknown): e is ExecFailure {
  return typeof e === 'object' && e !== null && 'message' in e && typeof e.message === 'string';
}

/** Wrap a value as a single-quoted PowerShell literal (no variable expansion). */
export function psQuote(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}

export function encodeScript(script: string): string {
  return Buffer.from(script, 'utf16le').toString('base64');
}

/**
 * Execute `script` in a hidden, profile-less PowerShell session.
 * `operation` names the caller in error details (e.g. "writeSetting").
 */
export function runPowerShell(script: string, operation: string, timeoutMs = 60000): string {
  const encoded = encodeScript(`$ErrorActionPreference = 'Stop'; ${script}`);

  try {
    return execSync(
      `powershell.exe -NoProfile -NonInteractive -ExecutionPolicy Bypass -EncodedCommand ${encoded}`,
      { encoding: 'utf-8', timeout: timeoutMs, windowsHide: true, stdio: ['pipe', 'pipe', 'pipe'] }
    ).trim();
  } catch (e) {
    if (!isExecFailure(e)) {
      throw new ExecutionError(operation, String(e));
    }
    if (e.code === 'ETIMEDOUT') {
      throw new TimeoutError(operation, timeoutMs);
    }
    if (e.code === 'ENOENT') {
      throw new ExecutionError(operation, 'powershell.exe not found — is this a Windows system?');
    }

    const stderr = e.stderr?.toString().trim() ?? '';
    const text = stderr || e.message;
    if (ACCESS_DENIED_PATTERNS.some(p => p.test(text))) {
      throw new AccessDeniedError(operation);
    }
    throw new ExecutionError(operation, text);
  }
}

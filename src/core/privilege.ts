/**
 * core/privilege.ts
 *
 * Read-only privilege queries. The engine asks before every elevated
 * apply/undo and treats "no" as a skip. Nothing here ever requests
 * elevation; relaunching as administrator is the caller's business.
 */

import { execSync } from 'child_process';
import { scopedLogger } from './logger';

const log = scopedLogger('core/privilege');

export interface PrivilegeGate {
  isElevated(): boolean;
}

/**
 * Probes with `net session`, which succeeds only for an elevated process.
 * Non-Windows platforms (dev/CI machines) are never elevated.
 */
export class WindowsPrivilegeGate implements PrivilegeGate {
  constructor(private readonly platform: NodeJS.Platform = process.platform) {}

  isElevated(): boolean {
    if (this.platform !== 'win32') {
      log.debug({ platform: this.platform }, 'Non-Windows platform — reporting not elevated');
      return false;
    }

    try {
      execSync('net session', { stdio: 'pipe', windowsHide: true });
      return true;
    } catch {
      return false;
    }
  }
}

/** Fixed answer, for tests and simulations. */
export class StaticPrivilegeGate implements PrivilegeGate {
  constructor(private elevated: boolean) {}

  isElevated(): boolean {
    return this.elevated;
  }

  set(elevated: boolean): void {
    this.elevated = elevated;
  }
}

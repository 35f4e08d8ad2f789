import { execSync } from 'child_process';
import { PowerShellExecutor } from '../tools/powershell_executor';
import { psQuote, runPowerShell } from '../tools/powershell';

jest.mock('child_process');

const mockExecSync = jest.mocked(execSync);

/** The script of the n-th PowerShell call, decoded from -EncodedCommand. */
function script(call = 0): string {
  const command = String(mockExecSync.mock.calls[call][0]);
  const encoded = command.split(' -EncodedCommand ')[1];
  return Buffer.from(encoded, 'base64').toString('utf16le');
}

function execFailure(message: string, extra: { code?: string; stderr?: string } = {}): Error {
  return Object.assign(new Error(message), extra);
}

describe('PowerShell runner', () => {
  beforeEach(() => {
    jest.clearAllMocks();
  });

  it('quotes literals for single-quoted strings', () => {
    expect(psQuote("it's")).toBe("'it''s'");
  });

  it('runs the script hidden, with errors as terminating', () => {
    mockExecSync.mockReturnValue('  done \r\n');

    expect(runPowerShell('Write-Output done', 'test', 1234)).toBe('done');

    const [command, options] = mockExecSync.mock.calls[0];
    expect(String(command)).toMatch(/^powershell\.exe -NoProfile -NonInteractive -ExecutionPolicy Bypass -EncodedCommand /);
    expect(options).toMatchObject({ timeout: 1234, windowsHide: true, encoding: 'utf-8' });
    expect(script()).toBe("$ErrorActionPreference = 'Stop'; Write-Output done");
  });

  it('maps a timeout', () => {
    mockExecSync.mockImplementation(() => { throw execFailure('spawnSync powershell.exe ETIMEDOUT', { code: 'ETIMEDOUT' }); });

    expect(() => runPowerShell('Start-Sleep 100', 'sleep', 50)).toThrow('Operation "sleep" exceeded timeout of 50ms');
  });

  it('maps access denied from stderr', () => {
    mockExecSync.mockImplementation(() => {
      throw execFailure('Command failed', { stderr: 'Requested registry access is not allowed.' });
    });

    expect(() => runPowerShell('...', 'writeSetting')).toThrow('Access denied: "writeSetting"');
  });

  it('reports stderr for other failures', () => {
    mockExecSync.mockImplementation(() => {
      throw execFailure('Command failed', { stderr: 'Cannot find path' });
    });

    expect(() => runPowerShell('...', 'readSetting')).toThrow('Cannot find path');
  });
});

describe('PowerShellExecutor', () => {
  const executor = new PowerShellExecutor(5000);

  beforeEach(() => {
    jest.clearAllMocks();
  });

  describe('settings', () => {
    it('reads a value as type and data', async () => {
      mockExecSync.mockReturnValue('{"type":"DWord","data":4294967295}');

      await expect(executor.readSetting({ path: 'HKLM:\\Soft', name: 'Index' }))
        .resolves.toEqual({ type: 'DWord', data: 4294967295 });
      expect(script()).toContain("$p = 'HKLM:\\Soft'; $n = 'Index';");
    });

    it('reads a missing value as undefined', async () => {
      mockExecSync.mockReturnValue('null');

      await expect(executor.readSetting({ path: 'HKCU:\\K', name: 'Gone' })).resolves.toBeUndefined();
    });

    it('rejects value kinds it cannot restore', async () => {
      mockExecSync.mockReturnValue('{"type":"Binary","data":[1,2]}');

      await expect(executor.readSetting({ path: 'HKCU:\\K', name: 'Blob' }))
        .rejects.toThrow('Unsupported registry value at HKCU:\\K\\Blob');
    });

    it('writes unsigned DWORDs as Int32', async () => {
      mockExecSync.mockReturnValue('');

      await executor.writeSetting({ path: 'HKLM:\\Soft', name: 'Index' }, { type: 'DWord', data: 4294967295 });

      expect(script()).toContain('New-ItemProperty -LiteralPath $p -Name $n -Value ([int32]-1) -PropertyType DWord -Force');
    });

    it('writes strings as quoted literals', async () => {
      mockExecSync.mockReturnValue('');

      await executor.writeSetting({ path: 'HKLM:\\Soft', name: 'Priority' }, { type: 'String', data: "O'High" });

      expect(script()).toContain("-Value 'O''High' -PropertyType String");
    });

    it('reads QWORDs as decimal strings and writes them back unchanged', async () => {
      mockExecSync.mockReturnValueOnce('{"type":"QWord","data":"133456789012345679"}').mockReturnValueOnce('');
      const key = { path: 'HKCU:\\Soft', name: 'Stamp' };

      const value = await executor.readSetting(key);
      expect(value).toEqual({ type: 'QWord', data: '133456789012345679' });
      expect(script(0)).toContain("if ($kind -eq 'QWord') { $v = [string]$v }");

      if (value === undefined) return;
      await executor.writeSetting(key, value);
      expect(script(1)).toContain("-Value ([int64]'133456789012345679') -PropertyType QWord");
    });

    it('writes numeric QWORDs as Int64', async () => {
      mockExecSync.mockReturnValue('');

      await executor.writeSetting({ path: 'HKCU:\\Soft', name: 'Big' }, { type: 'QWord', data: 10 });

      expect(script()).toContain('-Value ([int64]10) -PropertyType QWord');
    });

    it('refuses data that does not fit the value type', async () => {
      const key = { path: 'HKCU:\\Soft', name: 'Mode' };

      await expect(executor.writeSetting(key, { type: 'DWord', data: 'High' }))
        .rejects.toThrow('Invalid DWord data for HKCU:\\Soft\\Mode: "High"');
      await expect(executor.writeSetting(key, { type: 'DWord', data: 4294967296 }))
        .rejects.toThrow('Invalid DWord data for HKCU:\\Soft\\Mode: 4294967296');
      await expect(executor.writeSetting(key, { type: 'QWord', data: 2 ** 60 }))
        .rejects.toThrow('Invalid QWord data');
      await expect(executor.writeSetting(key, { type: 'String', data: 5 }))
        .rejects.toThrow('Invalid String data');
      expect(mockExecSync).not.toHaveBeenCalled();
    });

    it('lists subkeys as provider paths', async () => {
      mockExecSync.mockReturnValue('["Registry::HKEY_LOCAL_MACHINE\\\\Ifaces\\\\{a}"]');

      await expect(executor.listSubKeys('HKLM:\\Ifaces')).resolves.toEqual(['Registry::HKEY_LOCAL_MACHINE\\Ifaces\\{a}']);
    });
  });

  describe('services', () => {
    it('reads start mode and status', async () => {
      mockExecSync.mockReturnValue('{"mode":"Automatic","running":true}');

      await expect(executor.readServiceMode('SysMain')).resolves.toEqual({ mode: 'Automatic', running: true });
    });

    it('reads a missing service as undefined', async () => {
      mockExecSync.mockReturnValue('null');

      await expect(executor.readServiceMode('Nope')).resolves.toBeUndefined();
    });

    it('sets the startup type', async () => {
      mockExecSync.mockReturnValue('');

      await executor.setServiceMode('SysMain', 'Disabled');

      expect(script()).toContain("Set-Service -Name 'SysMain' -StartupType Disabled;");
    });
  });

  describe('power schemes', () => {
    it('extracts the active scheme GUID', async () => {
      mockExecSync.mockReturnValue('Power Scheme GUID: 381B4222-F694-41F0-9685-FF5BB260DF2E  (Balanced)');

      await expect(executor.readActivePowerScheme()).resolves.toBe('381b4222-f694-41f0-9685-ff5bb260df2e');
    });

    it('refuses anything but a bare GUID', async () => {
      await expect(executor.setActivePowerScheme("381b4222-f694-41f0-9685-ff5bb260df2e'; Remove-Item C:\\"))
        .rejects.toThrow('Not a power scheme GUID');
      expect(mockExecSync).not.toHaveBeenCalled();
    });
  });

  it('expands environment variables in cache paths', async () => {
    mockExecSync.mockReturnValue('0');

    await executor.clearCache('%LOCALAPPDATA%\\D3DSCache');

    expect(script()).toContain("[Environment]::ExpandEnvironmentVariables('%LOCALAPPDATA%\\D3DSCache')");
  });
});

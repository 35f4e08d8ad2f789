import { execSync } from 'child_process';
import { StaticPrivilegeGate, WindowsPrivilegeGate } from '../core/privilege';

jest.mock('child_process');

const mockExecSync = jest.mocked(execSync);

describe('WindowsPrivilegeGate', () => {
  beforeEach(() => {
    jest.clearAllMocks();
  });

  it('is elevated when net session succeeds', () => {
    mockExecSync.mockReturnValue(Buffer.from(''));

    expect(new WindowsPrivilegeGate('win32').isElevated()).toBe(true);
    expect(mockExecSync).toHaveBeenCalledWith('net session', expect.objectContaining({ windowsHide: true }));
  });

  it('is not elevated when net session is refused', () => {
    mockExecSync.mockImplementation(() => { throw new Error('System error 5 has occurred. Access is denied.'); });

    expect(new WindowsPrivilegeGate('win32').isElevated()).toBe(false);
  });

  it('never probes on other platforms', () => {
    expect(new WindowsPrivilegeGate('linux').isElevated()).toBe(false);
    expect(mockExecSync).not.toHaveBeenCalled();
  });
});

describe('StaticPrivilegeGate', () => {
  it('answers what it was told', () => {
    const gate = new StaticPrivilegeGate(false);
    expect(gate.isElevated()).toBe(false);

    gate.set(true);
    expect(gate.isElevated()).toBe(true);
  });
});

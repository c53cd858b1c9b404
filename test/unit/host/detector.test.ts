import { detectHostPlatform, resolveEdition } from '../../../src/host/detector.js';
import { FullOsCommands } from '../../../src/host/commands/full-os.js';
import { createHostCommands } from '../../../src/host/commands/factory.js';
import { CommandRunner } from '../../../src/execution/runner.js';
import { RetryPolicy } from '../../../src/execution/retry.js';
import { InstallerErrorCode } from '../../../src/shared/errors.js';
import { ScriptedExecutor } from '../../helpers/scripted-executor.js';

function runnerFor(exec: ScriptedExecutor): CommandRunner {
  return new CommandRunner(exec, new RetryPolicy({ maxAttempts: 1, baseDelayMs: 0 }));
}

describe('host platform detection', () => {
  it('resolves the constrained edition from its edition ids', () => {
    expect(resolveEdition('IoTUAP')).toBe('constrained');
    expect(resolveEdition('ServerStandard')).toBe('full');
  });

  it('reads build and edition from the registry', async () => {
    const exec = new ScriptedExecutor([
      { stdout: '    CurrentBuild    REG_SZ    17763\r\n' },
      { stdout: '    EditionID    REG_SZ    IoTUAP\r\n' },
    ]);
    const platform = await detectHostPlatform(runnerFor(exec), new FullOsCommands());
    expect(platform).toEqual({ edition: 'constrained', build: 17763, editionId: 'IoTUAP' });
  });

  it('fails as an unsupported host when the build is unreadable', async () => {
    const exec = new ScriptedExecutor([{ stdout: 'nothing here' }]);
    await expect(detectHostPlatform(runnerFor(exec), new FullOsCommands())).rejects.toMatchObject({
      code: InstallerErrorCode.UNSUPPORTED_HOST,
    });
  });

  it('fails as an unsupported host when the registry query fails', async () => {
    const exec = new ScriptedExecutor([{ exitCode: 1, stderr: 'ERROR: The system was unable to find the specified registry key or value.' }]);
    await expect(detectHostPlatform(runnerFor(exec), new FullOsCommands())).rejects.toMatchObject({
      code: InstallerErrorCode.UNSUPPORTED_HOST,
      message: 'Could not determine the OS build number',
      context: { output: 'ERROR: The system was unable to find the specified registry key or value.' },
    });
    expect(exec.calls).toHaveLength(1);
  });

  it('skips the registry for overridden fields', async () => {
    const exec = new ScriptedExecutor([{}]);
    const platform = await detectHostPlatform(runnerFor(exec), new FullOsCommands(), { edition: 'full', build: 19041 });
    expect(platform.build).toBe(19041);
    expect(exec.calls).toHaveLength(0);
  });

  it('selects the capability set per edition', () => {
    const full = createHostCommands({ edition: 'full', build: 17763, editionId: '' });
    const constrained = createHostCommands({ edition: 'constrained', build: 17763, editionId: 'IoTUAP' });
    expect(full.packageInstall('C:\\pkg.cab').argv).toEqual(['dism.exe', '/online', '/add-package', '/packagepath:C:\\pkg.cab', '/norestart', '/quiet']);
    expect(constrained.packageChangeRequiresRestart).toBe(true);
    expect(constrained.supportsOptionalFeatures).toBe(false);
    expect(full.requiresVcRuntime).toBe(true);
  });
});

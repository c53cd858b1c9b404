import fs from 'fs/promises';
import { InstallerErrorCode } from '../../../src/shared/errors.js';
import { CONTAINER_OWNER_LABEL } from '../../../src/host/layout.js';
import { MACHINE_PATH } from '../../helpers/fake-host.js';
import { createTestHost, disposeTestHost, type TestHost } from '../../helpers/test-host.js';

const manual = { kind: 'manual', deviceConnectionString: 'HostName=hub.example.net;DeviceId=edge-01;SharedAccessKey=test-secret' } as const;

async function exists(p: string): Promise<boolean> {
  try {
    await fs.access(p);
    return true;
  } catch {
    return false;
  }
}

describe('uninstall', () => {
  let t: TestHost;

  beforeEach(async () => {
    t = await createTestHost();
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await disposeTestHost(t);
  });

  async function readyHost(containerOs: 'windows' | 'linux' = 'windows'): Promise<string> {
    t.host.seedInstalled();
    await t.orchestrator.initialize({ containerOs, provisioning: manual });
    t.host.containers = [
      { id: 'a1', name: 'edgeAgent', labels: [CONTAINER_OWNER_LABEL] },
      { id: 'm1', labels: [CONTAINER_OWNER_LABEL] },
      { id: 'other', labels: [] },
    ];
    return fs.readFile(t.layout.current.configPath, 'utf-8');
  }

  it('refuses when nothing is installed unless forced', async () => {
    await expect(t.orchestrator.uninstall()).rejects.toMatchObject({ code: InstallerErrorCode.PRECONDITION_VIOLATION });
  });

  it('succeeds when forced on an empty host', async () => {
    const result = await t.orchestrator.uninstall({ force: true });
    expect(result.success).toBe(true);
    expect(result.steps.filter((s) => s.outcome === 'failed' || s.outcome === 'warning')).toEqual([]);
    expect(result.preservedConfig).toBeNull();
  });

  it('removes services, package, files and environment and keeps the config', async () => {
    const config = await readyHost();
    const result = await t.orchestrator.uninstall();

    expect(result.success).toBe(true);
    expect(t.host.services.size).toBe(0);
    expect(t.host.packages).toEqual([]);
    expect(await exists(t.layout.current.installDir)).toBe(false);
    expect(await exists(t.layout.current.engineInstallDir)).toBe(false);
    expect(await exists(t.layout.current.configPath)).toBe(true);
    expect(await fs.readFile(t.layout.current.configPath, 'utf-8')).toBe(config);
    expect(await fs.readdir(t.layout.current.dataDir)).toEqual(['config.yaml']);
    expect(result.preservedConfig).toBe(t.layout.current.configPath);
    expect(t.host.machineEnv.get('Path')).toBe(MACHINE_PATH);
    expect(t.host.machineEnv.has('IOTEDGE_HOST')).toBe(false);
    expect(t.env.PATH).toBe('C:\\Windows\\system32');
    expect(t.env.IOTEDGE_HOST).toBeUndefined();
  });

  it('removes only runtime-owned containers by default', async () => {
    await readyHost();
    await t.orchestrator.uninstall();
    expect(t.host.containers.map((c) => c.id)).toEqual(['other']);
  });

  it('removes every container and the engine data root when asked', async () => {
    await readyHost();
    await fs.mkdir(t.layout.current.engineDataRoot, { recursive: true });
    const result = await t.orchestrator.uninstall({ deleteEngineDataRoot: true });
    expect(result.success).toBe(true);
    expect(t.host.containers).toEqual([]);
    expect(await exists(t.layout.current.engineDataRoot)).toBe(false);
  });

  it('keeps the engine data root by default and leaves the host installable', async () => {
    await readyHost();
    expect(await exists(t.layout.current.engineDataRoot)).toBe(true);
    await t.orchestrator.uninstall();

    expect(await exists(t.layout.current.engineDataRoot)).toBe(true);
    expect(await t.ctx.inspector.inspect()).toMatchObject({ runtimeInstalled: false, engineInstalled: false, layout: 'none' });
    await expect(t.orchestrator.uninstall()).rejects.toMatchObject({ code: InstallerErrorCode.PRECONDITION_VIOLATION });

    t.host.containersFeature = true;
    const reinstalled = await t.orchestrator.install({ containerOs: 'windows' });
    expect(reinstalled.restartRequired).toBe(false);
    expect(await t.ctx.inspector.inspect()).toMatchObject({ runtimeInstalled: true, engineInstalled: true, layout: 'current' });
  });

  it('keeps the machine search path when it cannot be read', async () => {
    await readyHost();
    const before = t.host.machineEnv.get('Path');
    t.host.failWhen((a) => a[1] === 'query' && a.includes('Path'), { exitCode: 1, stderr: 'ERROR: Access is denied.' }, 1);

    const result = await t.orchestrator.uninstall();
    expect(result.success).toBe(true);
    expect(result.steps).toContainEqual({
      step: 'remove search path entries', outcome: 'warning', detail: expect.stringContaining('Command exited with 1: reg.exe query'),
    });
    expect(t.host.machineEnv.get('Path')).toBe(before);
  });

  it('deletes the config when asked', async () => {
    await readyHost();
    const result = await t.orchestrator.uninstall({ deleteConfig: true });
    expect(await exists(t.layout.current.configPath)).toBe(false);
    expect(result.preservedConfig).toBeNull();
  });

  it('removes the firewall rule of a linux container setup', async () => {
    await readyHost('linux');
    expect(t.host.firewallRules).toHaveLength(1);
    const result = await t.orchestrator.uninstall();
    expect(t.host.firewallRules).toEqual([]);
    expect(result.steps).toContainEqual({ step: 'remove firewall rule', outcome: 'ok', detail: undefined });
  });

  it('records container failures as warnings and still succeeds', async () => {
    await readyHost();
    t.host.failWhen((a) => a.includes('rm'), { exitCode: 1, stderr: 'error during connect' });
    const result = await t.orchestrator.uninstall();
    expect(result.success).toBe(true);
    expect(result.steps.filter((s) => s.outcome === 'warning').map((s) => s.step)).toEqual([
      'remove agent container',
      'remove runtime-owned containers',
    ]);
  });

  it('reports a partial failure when a directory cannot be deleted', async () => {
    await readyHost();
    const realRm = fs.rm;
    jest.spyOn(fs, 'rm').mockImplementation(async (target, options) => {
      if (String(target) === t.layout.current.installDir) {
        throw Object.assign(new Error('EBUSY: resource busy or locked'), { code: 'EBUSY' });
      }
      return realRm(target, options);
    });

    const result = await t.orchestrator.uninstall();
    expect(result.success).toBe(false);
    expect(result.steps.filter((s) => s.outcome === 'failed')).toEqual([
      { step: 'delete directory', outcome: 'failed', detail: `${t.layout.current.installDir}: EBUSY: resource busy or locked` },
    ]);
    expect(result.guidance[0]).toBe('Some files could not be removed. Restart the host, then run Uninstall again with force.');
    expect(await exists(t.layout.current.engineInstallDir)).toBe(false);
  });

  it('reports a failed package removal but finishes the other steps', async () => {
    await readyHost();
    t.host.failWhen((a) => a.some((x) => x.startsWith('/remove-package')), { exitCode: 5, stdout: 'Error: 5 Access is denied.' });
    const result = await t.orchestrator.uninstall();
    expect(result.success).toBe(false);
    expect(result.steps.find((s) => s.step === 'remove runtime package')?.outcome).toBe('failed');
    expect(t.host.machineEnv.has('IOTEDGE_HOST')).toBe(false);
  });
});

import { SafetyGate } from '../../../src/safety/gate.js';
import { ToolRegistry } from '../../../src/tools/registry.js';
import type { ServerContext } from '../../../src/tools/context.js';
import { categorizeOutput, fromError } from '../../../src/tools/helpers.js';
import { registerLifecycleTools } from '../../../src/tools/lifecycle/index.js';
import { registerStatusTools } from '../../../src/tools/status/index.js';
import type { ToolResponse } from '../../../src/types/response.js';
import { InstallerError, InstallerErrorCode } from '../../../src/shared/errors.js';
import { createTestHost, disposeTestHost, type TestHost } from '../../helpers/test-host.js';

describe('MCP tools', () => {
  let t: TestHost;
  let ctx: ServerContext;

  beforeEach(async () => {
    t = await createTestHost();
    ctx = {
      settings: t.ctx.settings,
      orchestrator: t.orchestrator,
      safetyGate: new SafetyGate(t.ctx.settings.safety),
      registry: new ToolRegistry(),
      targetHost: 'localhost',
      configPath: '/home/edge/.config/edge-installer/config.yaml',
      firstRun: false,
    };
    registerLifecycleTools(ctx);
    registerStatusTools(ctx);
  });

  afterEach(async () => {
    await disposeTestHost(t);
  });

  async function call(name: string, args: Record<string, unknown> = {}): Promise<ToolResponse> {
    const tool = ctx.registry.get(name);
    if (!tool) throw new Error(`tool ${name} is not registered`);
    return tool.execute(args, { targetHost: 'localhost' });
  }

  it('registers every tool', () => {
    expect(ctx.registry.list().map((tool) => tool.metadata.name)).toEqual([
      'edge_install', 'edge_update', 'edge_initialize', 'edge_uninstall', 'edge_status', 'edge_logs',
    ]);
    expect(ctx.registry.size).toBe(6);
  });

  it('refuses a second tool with the same name', () => {
    const existing = ctx.registry.get('edge_status');
    if (!existing) throw new Error('edge_status is not registered');
    expect(() => ctx.registry.register(existing)).toThrow("Tool 'edge_status' is already registered");
    expect(ctx.registry.size).toBe(6);
  });

  it('reports an empty host', async () => {
    expect(await call('edge_status')).toMatchObject({
      status: 'success',
      tool: 'edge_status',
      data: {
        runtime_installed: false,
        engine_installed: false,
        layout: 'none',
        needs_relocation: false,
        os_build: 17763,
        edition: 'full',
        config_path: null,
        container_os: null,
        runtime_service: null,
        settings_path: '/home/edge/.config/edge-installer/config.yaml',
      },
    });
  });

  it('rejects arguments that do not match the schema', async () => {
    const response = await call('edge_install', { container_os: 'macos', confirmed: true });
    expect(response).toMatchObject({ status: 'error', error_code: 'VALIDATION_ERROR', error_category: 'validation' });
    expect(response).toHaveProperty('message', expect.stringMatching(/^container_os: /));
    expect(t.host.calls).toHaveLength(0);
  });

  it('maps Initialize rule violations to validation errors', async () => {
    expect(await call('edge_initialize', { provisioning: 'manual' })).toMatchObject({
      status: 'error',
      error_code: 'VALIDATION_ERROR',
      message: 'Manual provisioning requires device_connection_string',
      details: { field: 'device_connection_string' },
    });
  });

  it('installs without confirmation at moderate risk', async () => {
    t.host.containersFeature = true;
    expect(await call('edge_install')).toMatchObject({
      status: 'success',
      data: { container_os: 'windows', package_source: 'download', restarting: false, next_step: 'edge_initialize' },
      restart_required: false,
      warnings: [],
    });
  });

  it('asks before an install that may restart the host', async () => {
    expect(await call('edge_install', { restart_if_needed: true })).toMatchObject({
      status: 'confirmation_required',
      risk_level: 'high',
      preview: { warnings: ['The host will restart if the change requires it'] },
    });
    expect(t.host.calls).toHaveLength(0);
  });

  describe('edge_uninstall', () => {
    it('asks for confirmation', async () => {
      expect(await call('edge_uninstall')).toMatchObject({ status: 'confirmation_required', risk_level: 'high' });
      expect(await call('edge_uninstall', { delete_engine_data_root: true })).toMatchObject({ risk_level: 'critical' });
    });

    it('maps a precondition to a state error', async () => {
      expect(await call('edge_uninstall', { confirmed: true })).toMatchObject({
        status: 'error',
        error_code: 'PRECONDITION_VIOLATION',
        error_category: 'state',
        message: 'Nothing is installed. Pass force to clean up leftovers anyway.',
        remediation: ['Run edge_status to see what is installed and configured'],
      });
    });

    it('succeeds with force on an empty host', async () => {
      expect(await call('edge_uninstall', { confirmed: true, force: true })).toMatchObject({
        status: 'success',
        data: { preserved_config: null, guidance: [], restarting: false },
        restart_required: false,
        warnings: [],
      });
    });

    it('reports failed steps as a partial cleanup failure', async () => {
      t.host.seedInstalled();
      t.host.failWhen((argv) => argv.includes('/remove-package'), { exitCode: 5, stderr: 'Error: 5\r\nAccess is denied.' });

      const response = await call('edge_uninstall', { confirmed: true });
      expect(response).toMatchObject({
        status: 'error',
        error_code: 'PARTIAL_CLEANUP_FAILURE',
        error_category: 'resource',
        remediation: ['Some files could not be removed. Restart the host, then run Uninstall again with force.'],
        details: { restart_required: false },
      });
      expect(response).toHaveProperty('details.steps', expect.arrayContaining([
        expect.objectContaining({ step: 'remove runtime package', outcome: 'failed' }),
      ]));
    });
  });

  it('returns the most recent log entries', async () => {
    t.host.events = [
      { TimeCreated: '2026-01-01T00:01:00Z', Message: 'one' },
      { TimeCreated: '2026-01-01T00:02:00Z', Message: 'two' },
      { TimeCreated: '2026-01-01T00:03:00Z', Message: 'three' },
    ];
    expect(await call('edge_logs', { limit: 2 })).toMatchObject({
      status: 'success',
      data: {
        entries: [
          { time_created: '2026-01-01T00:02:00.000Z', message: 'two' },
          { time_created: '2026-01-01T00:03:00.000Z', message: 'three' },
        ],
      },
      total: 3,
      returned: 2,
      truncated: true,
    });
  });
});

describe('error mapping', () => {
  it('categorizes native tool output', () => {
    expect(categorizeOutput('Error: 5\r\n\r\nAccess is denied.')?.category).toBe('privilege');
    expect(categorizeOutput('The operation timed out')?.category).toBe('timeout');
    expect(categorizeOutput('There is not enough space on the disk.')?.category).toBe('resource');
    expect(categorizeOutput('Error: 87')).toBeNull();
  });

  it('prefers the output category for failed commands', () => {
    const err = new InstallerError(InstallerErrorCode.EXTERNAL_COMMAND_FAILED, 'dism.exe failed', { output: 'Access is denied.' });
    expect(fromError('edge_install', 'localhost', 12, err)).toMatchObject({
      error_code: 'EXTERNAL_COMMAND_FAILED',
      error_category: 'privilege',
      duration_ms: 12,
      details: { output: 'Access is denied.' },
    });
  });

  it('marks download failures as transient network errors', () => {
    const err = new InstallerError(InstallerErrorCode.RESOURCE_UNAVAILABLE, 'download failed', { url: 'https://example.com/a.cab' });
    expect(fromError('edge_install', 'localhost', 1, err)).toMatchObject({ error_category: 'network', transient: true });
  });

  it('wraps unknown errors', () => {
    expect(fromError('edge_status', 'localhost', 1, new Error('boom'))).toMatchObject({
      status: 'error',
      error_code: 'INTERNAL_ERROR',
      message: 'boom',
      transient: false,
    });
  });
});

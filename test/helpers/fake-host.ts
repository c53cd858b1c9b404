import fs from 'fs';
import path from 'path';
import type { Command } from '../../src/types/command.js';
import type { Executor, ExecResult } from '../../src/execution/executor.js';
import type { InstallationLayout } from '../../src/host/layout.js';

// In-process stand-in for a Windows host: answers the native commands the
// installer issues (sc, dism, reg, netsh, docker, powershell) from in-memory
// state, and lays package files down under the temp-dir layout.

export const PACKAGE_IDENTITY = 'Microsoft-Azure-IoTEdge~31bf3856ad364e35~amd64~~1.0.0.0';
const ENV_KEY = 'HKLM\\SYSTEM\\CurrentControlSet\\Control\\Session Manager\\Environment';

type ServiceStatus = 'running' | 'stopped';

interface Service {
  status: ServiceStatus;
  disabled: boolean;
}

interface Container {
  id: string;
  labels: string[];
  name?: string;
}

interface Override {
  match: (argv: string[]) => boolean;
  result: Partial<ExecResult>;
  remaining: number;
}

/** Machine search path every fake host starts with. */
export const MACHINE_PATH = 'C:\\Windows\\system32';

export interface FakeEvent {
  TimeCreated: string;
  Message: string;
}

export class FakeWindowsHost implements Executor {
  readonly calls: string[][] = [];
  readonly services = new Map<string, Service>();
  readonly packages: string[] = [];
  readonly machineEnv = new Map<string, string>();
  readonly firewallRules: string[] = [];
  containers: Container[] = [];
  containersFeature = false;
  build = 17763;
  editionId = 'ServerStandard';
  gateway: string | null = '10.0.75.1';
  events: FakeEvent[] = [];
  /** Exit code dism returns for a package install. */
  packageInstallExitCode = 0;
  vcRuntimeExitCode = 0;
  restarts = 0;
  private readonly overrides: Override[] = [];

  constructor(private readonly layout: InstallationLayout) {
    this.machineEnv.set('Path', MACHINE_PATH);
  }

  /** Answer the next `times` commands matching `match` with `result`. */
  failWhen(match: (argv: string[]) => boolean, result: Partial<ExecResult>, times = Number.POSITIVE_INFINITY): void {
    this.overrides.push({ match, result, remaining: times });
  }

  /** Calls whose program (basename) is `program`. */
  callsTo(program: string): string[][] {
    return this.calls.filter((argv) => path.basename(argv[0] ?? '').toLowerCase() === program);
  }

  /** Lay down an installed current-generation runtime with both services. */
  seedInstalled(): void {
    this.installPackage();
  }

  async execute(command: Command, _timeoutMs: number): Promise<ExecResult> {
    const argv = command.argv;
    this.calls.push(argv);
    const override = this.overrides.find((o) => o.remaining > 0 && o.match(argv));
    if (override) {
      override.remaining--;
      return { stdout: '', stderr: '', exitCode: 1, durationMs: 1, ...override.result };
    }
    const [exitCode, stdout] = this.dispatch(argv);
    return { stdout, stderr: '', exitCode, durationMs: 1 };
  }

  private dispatch(argv: string[]): [number, string] {
    const program = path.basename(argv[0] ?? '').toLowerCase();
    switch (program) {
      case 'sc.exe': return this.sc(argv.slice(1));
      case 'dism.exe': return this.dism(argv.slice(1));
      case 'reg.exe': return this.reg(argv.slice(1));
      case 'netsh.exe': return this.netsh(argv.slice(1));
      case 'docker.exe': return this.docker(argv.slice(1));
      case 'powershell.exe': return this.powershell(argv[argv.length - 1] ?? '');
      case 'icacls.exe': return [0, 'processed file: ' + (argv[1] ?? '')];
      case 'vc_redist.x64.exe': return [this.vcRuntimeExitCode, ''];
      case 'shutdown.exe':
        this.restarts++;
        return [0, ''];
      case 'cmd.exe':
        this.installPackage();
        return [0, ''];
      default: return [1, `'${program}' is not recognized as an internal or external command`];
    }
  }

  private sc([verb = '', name = '']: string[]): [number, string] {
    const svc = this.services.get(name);
    if (!svc) return [1060, `[SC] OpenService FAILED 1060:\r\n\r\nThe specified service does not exist as an installed service.`];
    switch (verb) {
      case 'query': {
        const state = svc.status === 'running' ? '4  RUNNING' : '1  STOPPED';
        return [0, `\r\nSERVICE_NAME: ${name}\r\n        TYPE               : 10  WIN32_OWN_PROCESS\r\n        STATE              : ${state}\r\n`];
      }
      case 'start':
        if (svc.status === 'running') return [1056, '[SC] StartService FAILED 1056:'];
        svc.status = 'running';
        return [0, ''];
      case 'stop':
        if (svc.status !== 'running') return [1062, '[SC] ControlService FAILED 1062:'];
        svc.status = 'stopped';
        return [0, ''];
      case 'config':
        svc.disabled = true;
        return [0, '[SC] ChangeServiceConfig SUCCESS'];
      case 'delete':
        this.services.delete(name);
        return [0, '[SC] DeleteService SUCCESS'];
      default: return [87, ''];
    }
  }

  private installPackage(): void {
    const { current } = this.layout;
    fs.mkdirSync(current.installDir, { recursive: true });
    fs.writeFileSync(current.runtimeBinary, 'binary');
    fs.mkdirSync(current.engineInstallDir, { recursive: true });
    fs.writeFileSync(current.engineCli, 'binary');
    fs.mkdirSync(current.engineDataRoot, { recursive: true });
    if (!this.packages.includes(PACKAGE_IDENTITY)) this.packages.push(PACKAGE_IDENTITY);
    for (const name of ['iotedge', 'iotedge-moby']) {
      if (!this.services.has(name)) this.services.set(name, { status: 'stopped', disabled: false });
    }
  }

  private dism(args: string[]): [number, string] {
    const op = args.find((a) => a.startsWith('/') && a !== '/online') ?? '';
    if (op === '/get-packages') {
      const rows = this.packages.map((p) => `${p} | Installed | Update | 1/1/2024 10:00 AM`);
      return [0, ['Package Identity | State | Release Type | Install Time', '------ | ------ | ------ | ------', ...rows].join('\r\n')];
    }
    if (op === '/add-package') {
      if (this.packageInstallExitCode === 0 || this.packageInstallExitCode === 3010) this.installPackage();
      return [this.packageInstallExitCode, ''];
    }
    if (op === '/remove-package') {
      const name = args.find((a) => a.startsWith('/packagename:'))?.slice('/packagename:'.length) ?? '';
      const i = this.packages.indexOf(name);
      if (i < 0) return [2, 'Error: 2'];
      this.packages.splice(i, 1);
      this.services.delete('iotedge');
      return [0, ''];
    }
    if (op === '/get-featureinfo') {
      return [0, `Feature Name : Containers\r\nState : ${this.containersFeature ? 'Enabled' : 'Disabled'}\r\n`];
    }
    if (op === '/enable-feature') {
      this.containersFeature = true;
      return [3010, ''];
    }
    return [87, 'Error: 87'];
  }

  private reg([verb = '', key = '', , name = '', ...rest]: string[]): [number, string] {
    if (verb === 'query') {
      let value: string | undefined;
      let type = 'REG_SZ';
      if (key === ENV_KEY) {
        value = this.machineEnv.get(name);
        type = 'REG_EXPAND_SZ';
      } else if (name === 'CurrentBuild') {
        value = String(this.build);
      } else if (name === 'EditionID') {
        value = this.editionId;
      }
      if (value === undefined) return [1, 'ERROR: The system was unable to find the specified registry key or value.'];
      return [0, `\r\n${key}\r\n    ${name}    ${type}    ${value}\r\n\r\n`];
    }
    if (verb === 'add') {
      const d = rest.indexOf('/d');
      this.machineEnv.set(name, rest[d + 1] ?? '');
      return [0, 'The operation completed successfully.'];
    }
    if (verb === 'delete') {
      if (!this.machineEnv.delete(name)) return [1, 'ERROR: The system was unable to find the specified registry key or value.'];
      return [0, 'The operation completed successfully.'];
    }
    return [1, ''];
  }

  private netsh(args: string[]): [number, string] {
    const name = args.find((a) => a.startsWith('name='))?.slice('name='.length) ?? '';
    if (args.includes('add')) {
      this.firewallRules.push(name);
      return [0, 'Ok.'];
    }
    const before = this.firewallRules.length;
    for (let i = this.firewallRules.length - 1; i >= 0; i--) {
      if (this.firewallRules[i] === name) this.firewallRules.splice(i, 1);
    }
    return before === this.firewallRules.length
      ? [1, 'No rules match the specified criteria.']
      : [0, `Deleted ${before - this.firewallRules.length} rule(s).\r\nOk.`];
  }

  private docker(args: string[]): [number, string] {
    const verb = args[2];
    if (verb === 'ps') {
      const filter = args.indexOf('--filter');
      const label = filter >= 0 ? (args[filter + 1] ?? '').replace(/^label=/, '') : null;
      const ids = this.containers.filter((c) => label === null || c.labels.includes(label)).map((c) => c.id);
      return [0, ids.join('\n')];
    }
    if (verb === 'rm') {
      const targets = args.slice(4);
      const missing = targets.filter((t) => !this.containers.some((c) => c.id === t || c.name === t));
      this.containers = this.containers.filter((c) => !targets.includes(c.id) && !(c.name && targets.includes(c.name)));
      return missing.length ? [1, `Error: No such container: ${missing[0]}`] : [0, targets.join('\n')];
    }
    return [1, ''];
  }

  private powershell(script: string): [number, string] {
    if (script.includes('Get-NetIPAddress')) return [0, this.gateway ?? ''];
    if (script.includes('Get-WinEvent')) {
      if (this.events.length === 0) return [0, ''];
      return [0, JSON.stringify(this.events.length === 1 ? this.events[0] : this.events)];
    }
    return [1, ''];
  }
}

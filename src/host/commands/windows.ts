import type { Command } from "../../types/command.js";
import type { HostEdition } from "../../types/host.js";
import type { EngineEndpoint, FirewallRule, HostCommands } from "./interface.js";

const MACHINE_ENVIRONMENT_KEY = "HKLM\\SYSTEM\\CurrentControlSet\\Control\\Session Manager\\Environment";
// Well-known SID of Authenticated Users; resolves on every locale.
const AUTHENTICATED_USERS_SID = "*S-1-5-11";

function powershell(script: string): Command {
  return { argv: ["powershell.exe", "-NoProfile", "-NonInteractive", "-Command", script] };
}

function psQuote(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}

/** Commands shared by every Windows edition. */
export abstract class WindowsCommands implements HostCommands {
  abstract readonly edition: HostEdition;
  abstract readonly packageChangeRequiresRestart: boolean;
  abstract readonly supportsOptionalFeatures: boolean;
  abstract readonly requiresVcRuntime: boolean;

  abstract packageInstall(artifactPath: string): Command;

  registryQuery(key: string, value: string): Command {
    return { argv: ["reg.exe", "query", key, "/v", value] };
  }

  restartHost(): Command {
    return { argv: ["shutdown.exe", "/r", "/t", "0"] };
  }

  gatewayAddressQuery(): Command {
    return powershell(
      "Get-NetIPAddress -AddressFamily IPv4 -ErrorAction SilentlyContinue | " +
      "Where-Object { $_.InterfaceAlias -like '*vEthernet (DockerNAT)*' } | " +
      "Select-Object -ExpandProperty IPAddress",
    );
  }

  packageList(): Command {
    return { argv: ["dism.exe", "/online", "/get-packages", "/format:table", "/english"] };
  }

  packageRemove(packageName: string): Command {
    return { argv: ["dism.exe", "/online", "/remove-package", `/packagename:${packageName}`, "/norestart", "/quiet"] };
  }

  vcRuntimeInstall(installerPath: string): Command {
    return { argv: [installerPath, "/quiet", "/norestart"] };
  }

  featureStatus(feature: string): Command {
    return { argv: ["dism.exe", "/online", "/get-featureinfo", `/featurename:${feature}`, "/english"] };
  }

  featureEnable(feature: string): Command {
    return { argv: ["dism.exe", "/online", "/enable-feature", `/featurename:${feature}`, "/all", "/norestart", "/quiet"] };
  }

  serviceQuery(service: string): Command {
    return { argv: ["sc.exe", "query", service] };
  }

  serviceControl(service: string, action: "start" | "stop"): Command {
    return { argv: ["sc.exe", action, service] };
  }

  serviceDisable(service: string): Command {
    // sc.exe expects "start=" and its value as separate arguments.
    return { argv: ["sc.exe", "config", service, "start=", "disabled"] };
  }

  serviceDelete(service: string): Command {
    return { argv: ["sc.exe", "delete", service] };
  }

  grantModify(path: string): Command {
    return { argv: ["icacls.exe", path, "/grant", `${AUTHENTICATED_USERS_SID}:(OI)(CI)(M)`] };
  }

  machineEnvironmentQuery(name: string): Command {
    return this.registryQuery(MACHINE_ENVIRONMENT_KEY, name);
  }

  machineEnvironmentSet(name: string, value: string): Command {
    return { argv: ["reg.exe", "add", MACHINE_ENVIRONMENT_KEY, "/v", name, "/t", "REG_EXPAND_SZ", "/d", value, "/f"] };
  }

  machineEnvironmentDelete(name: string): Command {
    return { argv: ["reg.exe", "delete", MACHINE_ENVIRONMENT_KEY, "/v", name, "/f"] };
  }

  firewallAddRule(rule: FirewallRule): Command {
    return {
      argv: [
        "netsh.exe", "advfirewall", "firewall", "add", "rule",
        `name=${rule.name}`, "dir=in", "action=allow",
        `program=${rule.program}`, `protocol=${rule.protocol}`,
        `localport=${rule.localPorts}`, "profile=any",
      ],
    };
  }

  firewallRemoveRule(name: string): Command {
    return { argv: ["netsh.exe", "advfirewall", "firewall", "delete", "rule", `name=${name}`] };
  }

  containerList(engine: EngineEndpoint, filter?: { label?: string }): Command {
    const argv = [engine.cli, "-H", engine.uri, "ps", "--all", "--quiet", "--no-trunc"];
    if (filter?.label) argv.push("--filter", `label=${filter.label}`);
    return { argv };
  }

  containerRemove(engine: EngineEndpoint, ids: string[]): Command {
    return { argv: [engine.cli, "-H", engine.uri, "rm", "--force", ...ids] };
  }

  providerEvents(provider: string, since: Date): Command {
    return powershell(
      "Get-WinEvent -ErrorAction SilentlyContinue -FilterHashtable @{" +
      `ProviderName=${psQuote(provider)};LogName='Application';` +
      `StartTime=[datetime]::Parse(${psQuote(since.toISOString())}).ToLocalTime()} | ` +
      "Select-Object @{n='TimeCreated';e={$_.TimeCreated.ToUniversalTime().ToString('o')}},Message | " +
      "ConvertTo-Json -Compress",
    );
  }
}

// Parsers for the text output of the native tools behind HostCommands.
// Each returns null (or an empty list) when the expected shape is absent.

/** Exit code sc.exe returns for a service that does not exist. */
export const SC_SERVICE_DOES_NOT_EXIST = 1060;
/** sc.exe start on a running service. */
export const SC_SERVICE_ALREADY_RUNNING = 1056;
/** sc.exe stop on a stopped service. */
export const SC_SERVICE_NOT_ACTIVE = 1062;
/** Windows installer / dism: success, reboot required. */
export const EXIT_REBOOT_REQUIRED = 3010;
/** VC++ redistributable: a newer version is already installed. */
export const EXIT_NEWER_VERSION_INSTALLED = 1638;

export type ServiceState = "running" | "stopped" | "start_pending" | "stop_pending" | "paused" | "unknown";

/** Value of `name` from `reg.exe query` output. */
export function parseRegistryValue(output: string, name: string): string | null {
  const escaped = name.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
  const match = output.match(new RegExp(`^\\s+${escaped}\\s+REG_\\w+(?:[ \\t]+(.*))?$`, "im"));
  if (!match) return null;
  return (match[1] ?? "").trim();
}

/** STATE line of `sc.exe query`. */
export function parseServiceState(output: string): ServiceState {
  const match = output.match(/STATE\s*:\s*\d+\s+(\w+)/);
  switch (match?.[1]?.toUpperCase()) {
    case "RUNNING": return "running";
    case "STOPPED": return "stopped";
    case "START_PENDING": return "start_pending";
    case "STOP_PENDING": return "stop_pending";
    case "PAUSED": return "paused";
    default: return "unknown";
  }
}

/** Package identities from `dism /get-packages /format:table` that start with `prefix`. */
export function parsePackageNames(output: string, prefix: string): string[] {
  const names: string[] = [];
  for (const line of output.split(/\r?\n/)) {
    const identity = line.split("|")[0]?.trim() ?? "";
    if (identity.toLowerCase().startsWith(prefix.toLowerCase())) names.push(identity);
  }
  return names;
}

/** `State : Enabled` from `dism /get-featureinfo`. */
export function parseFeatureEnabled(output: string): boolean {
  const match = output.match(/^\s*State\s*:\s*(.+)$/im);
  return match?.[1]?.trim().toLowerCase() === "enabled";
}

/** First IPv4 address in command output. */
export function parseIpv4(output: string): string | null {
  const match = output.match(/\b(?:\d{1,3}\.){3}\d{1,3}\b/);
  return match ? match[0] : null;
}

/** One id per non-empty line, as printed by `docker ps --quiet`. */
export function parseIdList(output: string): string[] {
  return output.split(/\r?\n/).map((l) => l.trim()).filter(Boolean);
}

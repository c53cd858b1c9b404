import type { HostEdition, HostPlatform } from "../types/host.js";
import type { CommandRunner } from "../execution/runner.js";
import type { HostCommands } from "./commands/interface.js";
import { parseRegistryValue } from "./commands/parse.js";
import { InstallerError, InstallerErrorCode } from "../shared/errors.js";
import { logger } from "../logger.js";

const CURRENT_VERSION_KEY = "HKLM\\SOFTWARE\\Microsoft\\Windows NT\\CurrentVersion";

/** EditionID values of the constrained IoT edition. */
const CONSTRAINED_EDITION_IDS = new Set(["iotuap", "iotcore"]);

export function resolveEdition(editionId: string): HostEdition {
  return CONSTRAINED_EDITION_IDS.has(editionId.toLowerCase()) ? "constrained" : "full";
}

/**
 * Detect the host edition and OS build from the registry.
 * Registry queries do not differ between editions, so any HostCommands can
 * serve them. Overrides from settings replace detected fields.
 */
export async function detectHostPlatform(
  runner: CommandRunner,
  commands: Pick<HostCommands, "registryQuery">,
  overrides?: { edition?: HostEdition; build?: number },
): Promise<HostPlatform> {
  logger.info("Starting host platform detection");

  let build = overrides?.build;
  if (build === undefined) {
    const r = await runner.execute(commands.registryQuery(CURRENT_VERSION_KEY, "CurrentBuild"), { duration: "instant", allowFailure: true });
    const raw = parseRegistryValue(r.stdout, "CurrentBuild");
    const parsed = raw === null ? NaN : Number.parseInt(raw, 10);
    if (!Number.isFinite(parsed)) {
      throw new InstallerError(InstallerErrorCode.UNSUPPORTED_HOST, "Could not determine the OS build number", { output: r.output });
    }
    build = parsed;
  }

  let editionId = overrides?.edition ?? "";
  if (!overrides?.edition) {
    const r = await runner.execute(commands.registryQuery(CURRENT_VERSION_KEY, "EditionID"), { duration: "instant", allowFailure: true });
    editionId = parseRegistryValue(r.stdout, "EditionID") ?? "";
    if (!editionId) logger.warn("EditionID not readable, assuming a full OS edition");
  }

  const platform: HostPlatform = {
    edition: overrides?.edition ?? resolveEdition(editionId),
    build,
    editionId,
  };
  logger.info({ platform }, "Host platform detection complete");
  return platform;
}

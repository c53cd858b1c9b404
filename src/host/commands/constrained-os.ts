import type { Command } from "../../types/command.js";
import { WindowsCommands } from "./windows.js";

/**
 * IoT edition. Packages are staged and committed through ApplyUpdate, which
 * only applies them on the next boot; there is no optional-feature toggle and
 * the VC++ runtime ships with the image.
 */
export class ConstrainedOsCommands extends WindowsCommands {
  readonly edition = "constrained" as const;
  readonly packageChangeRequiresRestart = true;
  readonly supportsOptionalFeatures = false;
  readonly requiresVcRuntime = false;

  packageInstall(artifactPath: string): Command {
    return { argv: ["cmd.exe", "/c", `ApplyUpdate -stage "${artifactPath}" && ApplyUpdate -commit`] };
  }
}

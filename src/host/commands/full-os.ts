import type { Command } from "../../types/command.js";
import { WindowsCommands } from "./windows.js";

/** Desktop and server editions: dism servicing, optional features, VC++ prerequisite. */
export class FullOsCommands extends WindowsCommands {
  readonly edition = "full" as const;
  readonly packageChangeRequiresRestart = false;
  readonly supportsOptionalFeatures = true;
  readonly requiresVcRuntime = true;

  packageInstall(artifactPath: string): Command {
    return { argv: ["dism.exe", "/online", "/add-package", `/packagepath:${artifactPath}`, "/norestart", "/quiet"] };
  }
}

// Factory for edition-specific capability sets. Called once at startup after
// detectHostPlatform(); the returned HostCommands travels in the lifecycle
// context so no call site branches on the edition again.
import type { HostPlatform } from "../../types/host.js";
import type { HostCommands } from "./interface.js";
import { FullOsCommands } from "./full-os.js";
import { ConstrainedOsCommands } from "./constrained-os.js";

export function createHostCommands(platform: HostPlatform): HostCommands {
  switch (platform.edition) {
    case "constrained": return new ConstrainedOsCommands();
    case "full": return new FullOsCommands();
  }
}

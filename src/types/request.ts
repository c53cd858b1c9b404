import type { ContainerOs } from "./host.js";

/** How the runtime obtains its device identity. Exactly one per Initialize. */
export type ProvisioningSpec =
  | { readonly kind: "manual"; readonly deviceConnectionString: string }
  | { readonly kind: "dps"; readonly scopeId: string; readonly registrationId: string }
  | { readonly kind: "existing" };

/** Private registry credentials for the agent image. */
export interface RegistryCredential {
  readonly registryHost: string;
  readonly username: string;
  readonly password: string;
}

/** Agent image override, with optional credentials for its registry. */
export interface AgentImageSpec {
  readonly image: string;
  readonly credential?: RegistryCredential;
}

/** Options shared by Install and Update. */
export interface DeployRequest {
  readonly containerOs: ContainerOs;
  readonly proxy?: string;
  readonly offlineInstallationPath?: string;
  readonly restartIfNeeded?: boolean;
}

export interface UpdateRequest extends Omit<DeployRequest, "containerOs"> {
  /** Defaults to the mode recorded in the config document. */
  readonly containerOs?: ContainerOs;
}

export interface InitializeRequest {
  readonly containerOs: ContainerOs;
  readonly provisioning: ProvisioningSpec;
  readonly agent?: AgentImageSpec;
  /** Defaults to the lower-cased machine name. */
  readonly hostname?: string;
}

export interface UninstallRequest {
  readonly force?: boolean;
  readonly deleteConfig?: boolean;
  readonly deleteEngineDataRoot?: boolean;
  readonly restartIfNeeded?: boolean;
}

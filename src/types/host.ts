/** Container mode the runtime is configured for. */
export type ContainerOs = "windows" | "linux";

/** Host edition: full desktop/server OS, or the constrained IoT edition. */
export type HostEdition = "full" | "constrained";

/** Which layout generation is active on the host. */
export type LayoutGeneration = "none" | "current" | "legacy";

/** Minimum OS build able to host Linux containers through the external engine. */
export const MIN_BUILD_FOR_LINUX_CONTAINERS = 14393;

/** Exact OS builds that support the Windows container path. */
export const SUPPORTED_BUILDS_FOR_WINDOWS_CONTAINERS: readonly number[] = [17763];

/** Detected host platform, resolved once at startup. */
export interface HostPlatform {
  readonly edition: HostEdition;
  readonly build: number;
  readonly editionId: string;
}

/**
 * Read-only projection of the host's installation state.
 * Recomputed on every inspection and never persisted.
 */
export interface HostState {
  readonly runtimeInstalled: boolean;
  readonly engineInstalled: boolean;
  readonly layout: LayoutGeneration;
  readonly osBuild: number;
  readonly isConstrainedOs: boolean;
}

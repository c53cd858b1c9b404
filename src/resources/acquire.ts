// Resource acquisition: find an artifact in the operator's offline directory,
// or download it into a scratch directory the caller releases after use.
// Downloads are never kept between invocations.
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import fg from "fast-glob";
import type { Downloader } from "./downloader.js";
import { InstallerError, InstallerErrorCode, isInstallerError } from "../shared/errors.js";
import { logger } from "../logger.js";

export interface ArtifactRequest {
  /** Human-readable name for logs and errors. */
  readonly description: string;
  readonly remoteUrl: string;
  readonly localFileName: string;
  /** Glob matched against the offline directory, e.g. "Microsoft-Azure-IoTEdge*.cab". */
  readonly cacheGlob: string;
}

export interface AcquireOptions {
  readonly offlineDirectory?: string;
  readonly proxy?: string;
}

export interface AcquiredArtifact {
  readonly path: string;
  /** Downloaded into a scratch directory; release() deletes it. */
  readonly isTemporary: boolean;
}

export class ResourceAcquirer {
  constructor(
    private readonly downloader: Downloader,
    private readonly options: { timeoutMs?: number; scratchRoot?: string } = {},
  ) {}

  async acquire(request: ArtifactRequest, options: AcquireOptions = {}): Promise<AcquiredArtifact> {
    if (options.offlineDirectory) {
      const cached = await this.findOffline(request, options.offlineDirectory);
      if (cached) {
        logger.info({ artifact: request.description, path: cached }, "Using offline artifact");
        return { path: cached, isTemporary: false };
      }
      logger.info({ artifact: request.description, offlineDirectory: options.offlineDirectory }, "Artifact not in offline directory, downloading");
    }

    const scratch = await fs.mkdtemp(path.join(this.options.scratchRoot ?? os.tmpdir(), "edge-installer-"));
    const destination = path.join(scratch, request.localFileName);
    try {
      await this.downloader.download(request.remoteUrl, destination, { proxy: options.proxy, timeoutMs: this.options.timeoutMs });
    } catch (err) {
      await fs.rm(scratch, { recursive: true, force: true });
      if (isInstallerError(err)) throw err;
      throw new InstallerError(
        InstallerErrorCode.RESOURCE_UNAVAILABLE,
        `Could not download ${request.description} from ${request.remoteUrl}`,
        { url: request.remoteUrl, cause: err instanceof Error ? err.message : String(err) },
      );
    }
    logger.info({ artifact: request.description, path: destination }, "Artifact downloaded");
    return { path: destination, isTemporary: true };
  }

  /** Delete a temporary artifact and its scratch directory. Offline artifacts are left alone. */
  async release(artifact: AcquiredArtifact): Promise<void> {
    if (!artifact.isTemporary) return;
    await fs.rm(path.dirname(artifact.path), { recursive: true, force: true });
  }

  /** Exact file name first, otherwise the last glob match in sorted order (newest version). */
  private async findOffline(request: ArtifactRequest, directory: string): Promise<string | null> {
    const matches = await fg(request.cacheGlob, {
      cwd: directory,
      absolute: true,
      onlyFiles: true,
      caseSensitiveMatch: false,
      followSymbolicLinks: false,
    });
    if (matches.length === 0) return null;
    const exact = matches.find((m) => path.basename(m).toLowerCase() === request.localFileName.toLowerCase());
    if (exact) return path.normalize(exact);
    const last = [...matches].sort().at(-1);
    return last ? path.normalize(last) : null;
  }
}

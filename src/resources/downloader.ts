import fs from "node:fs/promises";
import { fetch, ProxyAgent } from "undici";
import { InstallerError, InstallerErrorCode } from "../shared/errors.js";

export interface DownloadOptions {
  readonly proxy?: string;
  readonly timeoutMs?: number;
}

/** Download transport: fetch a URL into a local file. */
export interface Downloader {
  download(url: string, destination: string, options?: DownloadOptions): Promise<void>;
}

/** HTTP transport on undici; a proxy URL routes the request through a ProxyAgent. */
export class HttpDownloader implements Downloader {
  async download(url: string, destination: string, options: DownloadOptions = {}): Promise<void> {
    const dispatcher = options.proxy ? new ProxyAgent(options.proxy) : undefined;
    try {
      const response = await fetch(url, {
        dispatcher,
        redirect: "follow",
        signal: options.timeoutMs ? AbortSignal.timeout(options.timeoutMs) : undefined,
      });
      if (!response.ok) {
        throw new InstallerError(
          InstallerErrorCode.RESOURCE_UNAVAILABLE,
          `Download of ${url} failed with HTTP ${response.status}`,
          { url, status: response.status },
        );
      }
      await fs.writeFile(destination, Buffer.from(await response.arrayBuffer()));
    } finally {
      await dispatcher?.close();
    }
  }
}

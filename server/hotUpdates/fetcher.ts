import fs, { type FileHandle } from "node:fs/promises";
import path from "node:path";

import { nanoid } from "nanoid";

import { combineSignals, createCancellationError, isCancellationError } from "./cancellation.js";
import { HotUpdateError, toErrorMessage } from "./errors.js";
import type { ArchiveFetcher, ArchiveFetchOptions, DownloadProgress } from "./types.js";

export interface HttpArchiveFetcherOptions {
  /** Aborts the transfer when no bytes arrive for this long. */
  idleTimeoutMs: number;
  userAgent?: string;
  fetchFn?: typeof fetch;
}

const DEFAULT_USER_AGENT = "hot-content-updates/1.0";

function parseDownloadUrl(raw: string): URL {
  const trimmed = raw.trim();
  if (trimmed.length === 0) {
    throw new HotUpdateError("URL_REQUIRED", "Download URL is required.");
  }

  let parsed: URL;
  try {
    parsed = new URL(trimmed);
  } catch {
    throw new HotUpdateError("DOWNLOAD_FAILED", `Download URL is not valid: ${trimmed}`);
  }

  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
    throw new HotUpdateError("DOWNLOAD_FAILED", `Unsupported download protocol: ${parsed.protocol}`);
  }

  return parsed;
}

function parseContentLength(raw: string | null): number | null {
  if (!raw) {
    return null;
  }
  const parsed = Number.parseInt(raw, 10);
  return Number.isFinite(parsed) && parsed >= 0 ? parsed : null;
}

interface IdleTimer {
  arm(): void;
  clear(): void;
}

function createIdleTimer(timeoutMs: number, onTimeout: () => void): IdleTimer {
  let handle: NodeJS.Timeout | null = null;
  const clear = () => {
    if (handle) {
      clearTimeout(handle);
      handle = null;
    }
  };

  return {
    arm() {
      clear();
      handle = setTimeout(onTimeout, timeoutMs);
    },
    clear
  };
}

function toProgress(receivedBytes: number, totalBytes: number | null): DownloadProgress {
  return {
    receivedBytes,
    totalBytes,
    percent: totalBytes && totalBytes > 0 ? Math.min(100, Math.floor((receivedBytes / totalBytes) * 100)) : null
  };
}

async function releaseResponseBody(release: () => Promise<void>): Promise<void> {
  try {
    await release();
  } catch (error) {
    // A body that already errored rejects its cancel with that error.
    console.warn(`[hot-updates] Could not release the download stream: ${toErrorMessage(error)}`);
  }
}

export class HttpArchiveFetcher implements ArchiveFetcher {
  private readonly fetchFn: typeof fetch;

  constructor(private readonly options: HttpArchiveFetcherOptions) {
    this.fetchFn = options.fetchFn ?? ((input, init) => fetch(input, init));
  }

  async fetch(url: string, options: ArchiveFetchOptions): Promise<string> {
    const sourceUrl = parseDownloadUrl(url);

    try {
      await fs.mkdir(options.tempDir, { recursive: true });
    } catch (error) {
      throw new HotUpdateError("TEMP_DIR_ERROR", `Could not prepare download directory: ${toErrorMessage(error)}`, {
        cause: error
      });
    }

    const archivePath = path.join(options.tempDir, `update-${nanoid(8)}.zip`);
    try {
      await this.downloadToFile(sourceUrl, archivePath, options);
      return archivePath;
    } catch (error) {
      await fs.rm(archivePath, { force: true });
      throw error;
    }
  }

  private async downloadToFile(sourceUrl: URL, archivePath: string, options: ArchiveFetchOptions): Promise<void> {
    const timeoutController = new AbortController();
    const idleTimer = createIdleTimer(this.options.idleTimeoutMs, () => {
      timeoutController.abort(createCancellationError(`Download stalled for ${this.options.idleTimeoutMs}ms`));
    });
    const signal = combineSignals(timeoutController.signal, options.signal);

    let handle: FileHandle | null = null;
    // Set once a body exists; cleared after a complete read.
    let releaseBody: (() => Promise<void>) | null = null;
    idleTimer.arm();

    try {
      const response = await this.fetchFn(sourceUrl, {
        method: "GET",
        signal,
        headers: {
          "User-Agent": this.options.userAgent ?? DEFAULT_USER_AGENT
        }
      });

      const body = response.body;
      if (body) {
        releaseBody = () => body.cancel();
      }

      if (!response.ok) {
        throw new HotUpdateError("HTTP_ERROR", `Update download returned HTTP ${response.status}.`);
      }
      if (!body) {
        throw new HotUpdateError("DOWNLOAD_FAILED", "Update download returned an empty body.");
      }

      const totalBytes = parseContentLength(response.headers.get("content-length"));
      try {
        handle = await fs.open(archivePath, "wx");
      } catch (error) {
        throw new HotUpdateError("TEMP_DIR_ERROR", `Could not create download file: ${toErrorMessage(error)}`, {
          cause: error
        });
      }

      const reader = body.getReader();
      releaseBody = () => reader.cancel();
      let receivedBytes = 0;
      options.onProgress?.(toProgress(0, totalBytes));

      while (true) {
        const chunk = await reader.read();
        if (chunk.done) {
          releaseBody = null;
          break;
        }

        const bytes = chunk.value ?? new Uint8Array(0);
        if (bytes.length === 0) {
          continue;
        }

        idleTimer.arm();
        await handle.write(bytes);
        receivedBytes += bytes.length;
        options.onProgress?.(toProgress(receivedBytes, totalBytes));
      }

      if (receivedBytes === 0) {
        throw new HotUpdateError("DOWNLOAD_FAILED", "Update download was empty.");
      }
    } catch (error) {
      if (error instanceof HotUpdateError) {
        throw error;
      }
      if (options.signal?.aborted) {
        throw createCancellationError();
      }
      if (timeoutController.signal.aborted || isCancellationError(error)) {
        throw new HotUpdateError("DOWNLOAD_FAILED", "Update download timed out.", { cause: error });
      }
      throw new HotUpdateError("DOWNLOAD_FAILED", `Update download failed: ${toErrorMessage(error)}`, {
        cause: error
      });
    } finally {
      idleTimer.clear();
      if (releaseBody) {
        await releaseResponseBody(releaseBody);
      }
      if (handle) {
        await handle.close();
      }
    }
  }
}

import { z } from "zod";

import { combineSignals } from "./cancellation.js";
import { HotUpdateError, toErrorMessage } from "./errors.js";
import type { UpdateManifest, UpdateManifestSource } from "./types.js";

const manifestSchema = z.object({
  version: z.string().trim().min(1).max(128),
  url: z.string().trim().min(1).max(2048)
});

export interface HttpManifestSourceOptions {
  manifestUrl: string;
  timeoutMs: number;
  fetchFn?: typeof fetch;
}

export function parseUpdateManifest(payload: unknown, manifestUrl: string): UpdateManifest {
  const parsed = manifestSchema.safeParse(payload);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue ? issue.path.join(".") : "manifest";
    throw new HotUpdateError("MANIFEST_UNAVAILABLE", `Update manifest is invalid at "${field}".`);
  }

  let archiveUrl: string;
  try {
    archiveUrl = new URL(parsed.data.url, manifestUrl).toString();
  } catch {
    throw new HotUpdateError("MANIFEST_UNAVAILABLE", `Update manifest url is not valid: ${parsed.data.url}`);
  }

  return {
    version: parsed.data.version,
    url: archiveUrl
  };
}

export class HttpManifestSource implements UpdateManifestSource {
  private readonly fetchFn: typeof fetch;

  constructor(private readonly options: HttpManifestSourceOptions) {
    this.fetchFn = options.fetchFn ?? ((input, init) => fetch(input, init));
  }

  async fetchLatest(signal?: AbortSignal): Promise<UpdateManifest> {
    const manifestUrl = this.options.manifestUrl.trim();
    if (manifestUrl.length === 0) {
      throw new HotUpdateError("MANIFEST_UNAVAILABLE", "HOT_UPDATES_MANIFEST_URL is not configured.");
    }

    const controller = new AbortController();
    const timeout = setTimeout(() => {
      controller.abort(`Manifest lookup timed out after ${this.options.timeoutMs}ms`);
    }, this.options.timeoutMs);

    let payload: unknown;
    try {
      const response = await this.fetchFn(manifestUrl, {
        method: "GET",
        headers: { Accept: "application/json" },
        signal: combineSignals(controller.signal, signal)
      });

      if (!response.ok) {
        throw new HotUpdateError("MANIFEST_UNAVAILABLE", `Update manifest returned HTTP ${response.status}.`);
      }

      payload = await response.json();
    } catch (error) {
      if (error instanceof HotUpdateError) {
        throw error;
      }
      throw new HotUpdateError("MANIFEST_UNAVAILABLE", `Update manifest lookup failed: ${toErrorMessage(error)}`, {
        cause: error
      });
    } finally {
      clearTimeout(timeout);
    }

    return parseUpdateManifest(payload, manifestUrl);
  }
}

import path from "node:path";

import type { BundleInfoProvider, Version } from "./types.js";
import { normalizeVersion } from "./versioning.js";

export const DEFAULT_BUNDLE_VERSION = "1.0.0";

export class StaticBundleInfo implements BundleInfoProvider {
  private readonly version: Version;
  private readonly contentPath: string;

  constructor(version: string | undefined, contentPath: string) {
    this.version = normalizeVersion(version) ?? DEFAULT_BUNDLE_VERSION;
    this.contentPath = path.resolve(contentPath);
  }

  getBundleVersion(): Version {
    return this.version;
  }

  getBundleContentPath(): string {
    return this.contentPath;
  }
}

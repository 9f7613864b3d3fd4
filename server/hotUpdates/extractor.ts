import { execFile } from "node:child_process";
import fs from "node:fs/promises";
import { promisify } from "node:util";

import { HotUpdateError, toErrorMessage } from "./errors.js";
import type { ArchiveExtractor } from "./types.js";

const execFileAsync = promisify(execFile);

const ZIP_MAGIC = Buffer.from([0x50, 0x4b, 0x03, 0x04]);

export type CommandRunner = (binary: string, args: string[], timeoutMs: number) => Promise<void>;

export interface UnzipArchiveExtractorOptions {
  unzipBinary: string;
  timeoutMs: number;
  runCommand?: CommandRunner;
}

const defaultCommandRunner: CommandRunner = async (binary, args, timeoutMs) => {
  await execFileAsync(binary, args, {
    timeout: timeoutMs,
    maxBuffer: 1024 * 1024
  });
};

export async function hasZipSignature(archivePath: string): Promise<boolean> {
  const handle = await fs.open(archivePath, "r");
  try {
    const header = Buffer.alloc(ZIP_MAGIC.length);
    const { bytesRead } = await handle.read(header, 0, header.length, 0);
    return bytesRead === ZIP_MAGIC.length && header.equals(ZIP_MAGIC);
  } finally {
    await handle.close();
  }
}

export class UnzipArchiveExtractor implements ArchiveExtractor {
  private readonly runCommand: CommandRunner;

  constructor(private readonly options: UnzipArchiveExtractorOptions) {
    this.runCommand = options.runCommand ?? defaultCommandRunner;
  }

  async extract(archivePath: string, destinationPath: string): Promise<void> {
    let isZip: boolean;
    try {
      isZip = await hasZipSignature(archivePath);
    } catch (error) {
      throw new HotUpdateError("EXTRACTION_FAILED", `Could not read update archive: ${toErrorMessage(error)}`, {
        cause: error
      });
    }
    if (!isZip) {
      throw new HotUpdateError("EXTRACTION_FAILED", "Update archive is not a ZIP file.");
    }

    try {
      await fs.rm(destinationPath, { recursive: true, force: true });
      await fs.mkdir(destinationPath, { recursive: true });
    } catch (error) {
      throw new HotUpdateError("TEMP_DIR_ERROR", `Could not prepare extraction directory: ${toErrorMessage(error)}`, {
        cause: error
      });
    }

    try {
      await this.runCommand(
        this.options.unzipBinary,
        ["-qq", "-o", archivePath, "-d", destinationPath],
        this.options.timeoutMs
      );
    } catch (error) {
      throw new HotUpdateError("EXTRACTION_FAILED", `unzip failed: ${toErrorMessage(error)}`, { cause: error });
    }
  }
}

import { z } from "zod";

import { HotUpdateError } from "./errors.js";
import type { CanaryReport, UpdateAvailableEvent, Version } from "./types.js";

const requiredString = z.string().trim().min(1).max(2048);

const downloadRequestSchema = z.object({
  url: requiredString,
  version: requiredString.max(128)
});

const checkRequestSchema = z.object({
  version: requiredString.max(128),
  url: requiredString.optional()
});

const canaryReportSchema = z.object({
  version: requiredString.max(128),
  success: z.boolean().optional().default(true)
});

const versionRequestSchema = z.object({
  version: requiredString.max(128)
});

export interface DownloadRequest {
  url: string;
  version: Version;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function requireRecord(value: unknown): Record<string, unknown> {
  if (!isRecord(value)) {
    throw new HotUpdateError("UPDATE_DATA_REQUIRED", "Update data is required.");
  }
  return value;
}

function toValidationError(error: z.ZodError): HotUpdateError {
  const fields = new Set(error.issues.map((issue) => issue.path[0]));
  if (fields.has("url")) {
    return new HotUpdateError("URL_REQUIRED", "A non-empty url is required.");
  }
  if (fields.has("version")) {
    return new HotUpdateError("VERSION_REQUIRED", "A non-empty version is required.");
  }
  return new HotUpdateError("UPDATE_DATA_REQUIRED", error.issues[0]?.message ?? "Update data is invalid.");
}

function parseWith<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown): T {
  const parsed = schema.safeParse(requireRecord(value));
  if (!parsed.success) {
    throw toValidationError(parsed.error);
  }
  return parsed.data;
}

export function parseDownloadRequest(value: unknown): DownloadRequest {
  return parseWith(downloadRequestSchema, value);
}

export function parseUpdateAvailableEvent(value: unknown): UpdateAvailableEvent {
  return parseWith(checkRequestSchema, value);
}

export function parseCanaryReport(value: unknown): CanaryReport {
  return parseWith(canaryReportSchema, value);
}

export function parseVersionRequest(value: unknown): Version {
  return parseWith(versionRequestSchema, value).version;
}

export function requireVersion(value: unknown): Version {
  if (typeof value !== "string" || value.trim().length === 0) {
    throw new HotUpdateError("VERSION_REQUIRED", "A non-empty version is required.");
  }
  return value.trim();
}

import type { Version } from "./types.js";

export type VersionOrder = "less" | "equal" | "greater";

const NUMERIC_COMPONENT_PATTERN = /^\d+$/;

function toSafeInteger(raw: string): number {
  const trimmed = raw.trim();
  if (!NUMERIC_COMPONENT_PATTERN.test(trimmed)) {
    return 0;
  }

  const parsed = Number.parseInt(trimmed, 10);
  if (!Number.isFinite(parsed) || parsed < 0) {
    return 0;
  }

  return parsed;
}

/** Pre-release and build metadata (`-beta.1`, `+sha`) never affect ordering. */
function stripSuffix(raw: string): string {
  const trimmed = raw.trim();
  const suffixIndex = trimmed.search(/[-+]/);
  return suffixIndex >= 0 ? trimmed.slice(0, suffixIndex) : trimmed;
}

export function parseVersionComponents(raw: Version): number[] {
  const core = stripSuffix(typeof raw === "string" ? raw : "");
  if (core.length === 0) {
    return [0];
  }

  return core.split(".").map((component) => toSafeInteger(component));
}

/**
 * Total order over dotted version strings. Components compare as integers, missing
 * trailing components count as 0 and anything non-numeric counts as 0, so this never
 * throws.
 */
export function compareVersions(left: Version, right: Version): -1 | 0 | 1 {
  const leftParts = parseVersionComponents(left);
  const rightParts = parseVersionComponents(right);
  const maxLength = Math.max(leftParts.length, rightParts.length);

  for (let index = 0; index < maxLength; index += 1) {
    const leftValue = leftParts[index] ?? 0;
    const rightValue = rightParts[index] ?? 0;
    if (leftValue > rightValue) {
      return 1;
    }
    if (leftValue < rightValue) {
      return -1;
    }
  }

  return 0;
}

export function compareVersionOrder(left: Version, right: Version): VersionOrder {
  const result = compareVersions(left, right);
  if (result > 0) {
    return "greater";
  }
  if (result < 0) {
    return "less";
  }
  return "equal";
}

export function isNewerVersion(candidate: Version, baseline: Version): boolean {
  return compareVersions(candidate, baseline) > 0;
}

export function sameVersion(left: Version | null | undefined, right: Version | null | undefined): boolean {
  if (typeof left !== "string" || typeof right !== "string") {
    return false;
  }
  return left.trim() === right.trim();
}

export function normalizeVersion(raw: unknown): Version | undefined {
  if (typeof raw !== "string") {
    return undefined;
  }

  const trimmed = raw.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

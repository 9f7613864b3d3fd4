import type { HotUpdateErrorCode } from "./types.js";

const statusCodeByErrorCode: Record<HotUpdateErrorCode, number> = {
  URL_REQUIRED: 400,
  UPDATE_DATA_REQUIRED: 400,
  VERSION_REQUIRED: 400,
  DOWNLOAD_IN_PROGRESS: 409,
  NO_UPDATE_READY: 409,
  UPDATE_FILES_NOT_FOUND: 409,
  CANARY_PENDING: 409,
  ROLLBACK_UNAVAILABLE: 409,
  VERSION_INSTALLED: 409,
  VERSION_REJECTED: 409,
  HTTP_ERROR: 502,
  DOWNLOAD_FAILED: 502,
  MANIFEST_UNAVAILABLE: 502,
  WWW_NOT_FOUND: 422,
  TEMP_DIR_ERROR: 500,
  EXTRACTION_FAILED: 500,
  INSTALL_FAILED: 500
};

export class HotUpdateError extends Error {
  readonly statusCode: number;

  constructor(
    readonly code: HotUpdateErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "HotUpdateError";
    this.statusCode = statusCodeByErrorCode[code];
  }
}

export interface HotUpdateErrorPayload {
  code: string;
  message: string;
}

export function toErrorMessage(error: unknown): string {
  if (error instanceof Error && error.message.trim().length > 0) {
    return error.message.trim();
  }
  return String(error);
}

export function toErrorPayload(error: HotUpdateError): HotUpdateErrorPayload {
  return {
    code: error.code,
    message: error.message
  };
}

export function wrapHotUpdateError(code: HotUpdateErrorCode, prefix: string, error: unknown): HotUpdateError {
  if (error instanceof HotUpdateError) {
    return error;
  }
  return new HotUpdateError(code, `${prefix}: ${toErrorMessage(error)}`, { cause: error });
}

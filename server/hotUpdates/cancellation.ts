export const DOWNLOAD_CANCELLED_MESSAGE = "Update download cancelled";

export function createCancellationError(message: string = DOWNLOAD_CANCELLED_MESSAGE): Error {
  const error = new Error(message);
  error.name = "AbortError";
  return error;
}

// fetch rejects with a DOMException named AbortError or TimeoutError depending on the signal.
export function isCancellationError(error: unknown): boolean {
  return error instanceof Error && (error.name === "AbortError" || error.name === "TimeoutError");
}

export function combineSignals(...signals: Array<AbortSignal | undefined>): AbortSignal | undefined {
  const present = signals.filter((signal): signal is AbortSignal => signal !== undefined);
  if (present.length <= 1) {
    return present[0];
  }
  return AbortSignal.any(present);
}

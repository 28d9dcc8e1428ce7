const DEBUG_STORAGE_KEY = "sim-viewer-debug";

function readDebugFlag(): boolean {
  try {
    if (typeof window !== "undefined" && window.localStorage) {
      return window.localStorage.getItem(DEBUG_STORAGE_KEY) === "1";
    }
  } catch {
    return false;
  }
  return typeof process !== "undefined" && process.env.SIM_DEBUG === "1";
}

const DEBUG_ENABLED = readDebugFlag();

/** `console.debug` with a tag, enabled by localStorage in the browser or SIM_DEBUG=1 in Node. */
export function createDebugLog(tag: string): (...args: unknown[]) => void {
  return (...args: unknown[]) => {
    if (DEBUG_ENABLED) {
      console.debug(`[${tag}]`, ...args);
    }
  };
}

export function errorMessage(error: unknown, fallback = "Unknown error"): string {
  if (error instanceof Error && error.message) {
    return error.message;
  }
  if (typeof error === "string" && error) {
    return error;
  }
  return fallback;
}

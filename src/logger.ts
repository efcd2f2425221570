// Console-backed logger used by every component unless one is injected.
// Lines look like: [INFO] [ProsodyAnalyzer] Analysis complete: ...

import type { Logger } from "./types.js";

export function createConsoleLogger(scope: string): Logger {
  return {
    info: (msg, ...args) => console.log(`[INFO] [${scope}] ${msg}`, ...args),
    warn: (msg, ...args) => console.warn(`[WARN] [${scope}] ${msg}`, ...args),
    error: (msg, ...args) => console.error(`[ERROR] [${scope}] ${msg}`, ...args),
    debug: (msg, ...args) => {
      if (process.env.DEBUG) console.debug(`[DEBUG] [${scope}] ${msg}`, ...args);
    },
  };
}


// lib/debug.ts - console logging for the parse and analyze requests

// Step-by-step tracing (sessions, verdicts, model timings) is for `next dev` only
const DEBUG = process.env.NODE_ENV === 'development';

/** Pipeline tracing: extraction sizes, JD verdicts, completion timings. */
export const debug = (...args: unknown[]) => {
  if (DEBUG) {
    console.log(...args);
  }
};

/** Route failures that end in a 5xx. Printed in every environment. */
export const logError = (...args: unknown[]) => {
  console.error(...args);
};

/**
 * Recoverable problems the user still gets an answer for: a short resume,
 * a JD check that failed closed. Printed in every environment.
 */
export const logWarning = (...args: unknown[]) => {
  console.warn(...args);
};

export const logInfo = (...args: unknown[]) => {
  if (DEBUG) {
    console.info(...args);
  }
};

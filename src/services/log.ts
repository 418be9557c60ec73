// src/services/log.ts
// Console logging with a context tag.

const PREFIX = "atlas";

export function logError(error: unknown, context: string) {
  console.error(`[${PREFIX}:${context}]`, error);
}

export function logWarn(message: string, context: string) {
  console.warn(`[${PREFIX}:${context}] ${message}`);
}

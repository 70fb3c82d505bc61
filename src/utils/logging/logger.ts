export type LogContext = {
  requestId?: string;
};

let debugEnabled = process.env.DEBUG === "true";

export function configureLogger(options: { debug?: boolean }): void {
  debugEnabled = options.debug === true || process.env.DEBUG === "true";
}

export function isDebugEnabled(): boolean {
  return debugEnabled;
}

function prefix(context?: LogContext): string {
  return context?.requestId ? `[Request ${context.requestId}] ` : "";
}

export function logInfo(message: string, context?: LogContext): void {
  console.log(`${prefix(context)}${message}`);
}

export function logWarn(message: string, context?: LogContext): void {
  console.warn(`${prefix(context)}${message}`);
}

export function logError(message: string, error?: unknown, context?: LogContext): void {
  if (error === undefined) {
    console.error(`[ERROR] ${prefix(context)}${message}`);
    return;
  }
  console.error(`[ERROR] ${prefix(context)}${message}`, error);
}

export function logDebug(message: string, data?: unknown, context?: LogContext): void {
  if (!debugEnabled) return;
  if (data === undefined) {
    console.log(`[DEBUG] ${prefix(context)}${message}`);
    return;
  }
  console.log(`[DEBUG] ${prefix(context)}${message}`, data);
}

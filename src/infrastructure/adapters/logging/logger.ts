// Shared logging utilities for the harness
// All modules should import from this file instead of defining their own
// Everything goes to stderr: stdout is reserved for the verdict line

let verboseEnabled = false;

export function setVerboseLogging(enabled: boolean): void {
  verboseEnabled = enabled;
}

function writeLine(line: string): void {
  if (typeof process !== 'undefined' && process.stderr) {
    process.stderr.write(line + '\n');
  } else {
    console.error(line);
  }
}

export function log(module: string, message: string, ...args: unknown[]): void {
  const timestamp = new Date().toISOString();
  const argsStr = args.length > 0 ? ' ' + JSON.stringify(args) : '';
  writeLine(`[${timestamp}] [${module}] ${message}${argsStr}`);
}

export function logVerbose(component: string, message: string, data?: Record<string, unknown>): void {
  if (!verboseEnabled) {
    return;
  }
  const timestamp = new Date().toISOString();
  const dataStr = data ? ` | Data: ${JSON.stringify(data)}` : '';
  writeLine(`[${timestamp}] [VERBOSE] [${component}] ${message}${dataStr}`);
}

export function logPerformance(operation: string, duration: number, metadata?: Record<string, unknown>): void {
  if (!verboseEnabled) {
    return;
  }
  const timestamp = new Date().toISOString();
  const metadataStr = metadata ? ` | Metadata: ${JSON.stringify(metadata)}` : '';
  writeLine(`[${timestamp}] [PERFORMANCE] ${operation} took ${duration}ms${metadataStr}`);
}

export function logError(module: string, message: string, error?: unknown): void {
  const timestamp = new Date().toISOString();
  const errorStr = error instanceof Error ? ` | Error: ${error.message}` : error ? ` | Error: ${JSON.stringify(error)}` : '';
  writeLine(`[${timestamp}] [ERROR] [${module}] ${message}${errorStr}`);
}

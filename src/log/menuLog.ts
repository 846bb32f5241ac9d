import { appendFileSync, mkdirSync } from "node:fs";
import { join } from "node:path";

const TAG = "[menu]";

let logPath: string | null = null;

/** Enable file logging. Call once at startup with the data directory. */
export function initMenuLog(dataDir: string): void {
  mkdirSync(dataDir, { recursive: true });
  logPath = join(dataDir, "menu.log");
}

/** Stop appending to the log file (console output continues). */
export function closeMenuLog(): void {
  logPath = null;
}

function timestamp(): string {
  return new Date().toISOString();
}

function appendLine(line: string): void {
  if (!logPath) return;
  try {
    appendFileSync(logPath, `${line}\n`);
  } catch (err) {
    // Console copy is already out; stop retrying the file.
    logPath = null;
    console.error(`${timestamp()} ${TAG} log file disabled: ${String(err)}`);
  }
}

/** Log an informational message. */
export function menuLog(msg: string): void {
  const line = `${timestamp()} ${TAG} ${msg}`;
  console.info(line);
  appendLine(line);
}

/** Log a recoverable problem (e.g. a button without a shader). */
export function menuLogWarn(msg: string): void {
  const line = `${timestamp()} ${TAG} WARN ${msg}`;
  console.warn(line);
  appendLine(line);
}

/** Log an error. `err` may be an Error (stack is included) or any value. */
export function menuLogError(label: string, err: unknown): void {
  const msg = err instanceof Error ? `${err.message}\n${err.stack}` : String(err);
  const line = `${timestamp()} ${TAG} ERROR ${label}: ${msg}`;
  console.error(line);
  appendLine(line);
}

import fs from 'node:fs';
import path from 'node:path';

export interface LoggerOptions {
  level?: number;
  file?: string;
}

const MAX_EXTRA_BYTES = 2048;

let level = 0;
let logFilePath: string | undefined;
let wroteHeader = false;

export function configureLogger(options: LoggerOptions): void {
  if (options.level !== undefined) {
    setLevel(options.level);
  }
  logFilePath = options.file;
  wroteHeader = false;
}

export function setLevel(n: number) {
  level = Math.max(0, Math.min(3, Math.floor(n)));
}

export function getLevel(): number {
  return level;
}

/**
 * Writes `[timestamp] [tag] msg extra` to stderr when verbosity is at least
 * `lvl`, and to the log file if one is configured. stdout stays reserved for
 * command output.
 */
export function log(lvl: number, tag: string, msg: string, extra?: unknown) {
  if (level < lvl) return;
  const line = formatLine(`[${new Date().toISOString()}] [${tag}]`, msg, extra);
  process.stderr.write(line + '\n');
  appendToFile(line);
}

/**
 * Failures always reach the log file, whatever the level. They are echoed to
 * stderr only from level 1, since the CLI already reports the message itself.
 */
export function error(tag: string, msg: string, extra?: unknown) {
  const line = formatLine(`[${new Date().toISOString()}] [${tag}] ERROR`, msg, extra);
  if (level >= 1) process.stderr.write(line + '\n');
  appendToFile(line);
}

export function safeStringify(value: unknown, maxBytes: number = MAX_EXTRA_BYTES): string {
  const json = typeof value === 'string' ? value : JSON.stringify(value, null, 2);
  const bytes = Buffer.from(json, 'utf8');
  if (bytes.length <= maxBytes) return json;
  return bytes.subarray(0, maxBytes).toString('utf8') + '\n…(truncated)…';
}

export function formatLine(prefix: string, msg: string, extra?: unknown): string {
  if (extra === undefined) return `${prefix} ${msg}`;
  let serialized = '';
  try {
    serialized = safeStringify(extra);
  } catch {
    // circular or non-serializable extras are dropped from the line
  }
  return serialized ? `${prefix} ${msg} ${serialized}` : `${prefix} ${msg}`;
}

function appendToFile(line: string) {
  if (!logFilePath) return;
  try {
    fs.mkdirSync(path.dirname(logFilePath), { recursive: true });
    if (!wroteHeader) {
      fs.appendFileSync(logFilePath, `# git-usr verbose log\n# started: ${new Date().toISOString()}\n`, 'utf8');
      wroteHeader = true;
    }
    fs.appendFileSync(logFilePath, line + '\n', 'utf8');
  } catch {
    // a broken log file must not fail the command
  }
}

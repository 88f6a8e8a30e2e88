/**
 * Startup log: one human-readable line per event, prefixed `(i)`, `(w)` or `(e)`.
 * Continuation lines (multi-line messages) are indented under the prefix.
 */
export interface StartupLog {
  info(msg: string): void;
  warn(msg: string): void;
  error(msg: string): void;
}

type Writer = (line: string) => void;

export function formatLine(prefix: string, msg: string): string {
  return msg
    .split('\n')
    .map((line, i) => (i === 0 ? `${prefix} ${line}` : `    ${line}`))
    .join('\n');
}

export function createStartupLog(
  out: Writer = (line) => console.log(line),
  err: Writer = (line) => console.error(line),
): StartupLog {
  return {
    info: (msg) => out(formatLine('(i)', msg)),
    warn: (msg) => out(formatLine('(w)', msg)),
    error: (msg) => err(formatLine('(e)', msg)),
  };
}

/** Collects lines in memory; used by tests and by callers that need the text afterwards. */
export function createMemoryLog(): StartupLog & { lines: string[] } {
  const lines: string[] = [];
  const log = createStartupLog(
    (line) => lines.push(line),
    (line) => lines.push(line),
  );
  return { ...log, lines };
}

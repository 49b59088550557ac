const WRAPPERS = ['"', "'", "`"];

/** Strips one layer of matching quotes or backticks around `s`. */
export function unquote(s: string) {
  const t = s.trim();
  for (const w of WRAPPERS) {
    if (t.length >= 2 && t.startsWith(w) && t.endsWith(w)) {
      return t.slice(1, -1).trim();
    }
  }
  return t;
}

export function firstLine(s: string) {
  return s.split(/\r?\n/).find((line) => line.trim().length > 0)?.trim() ?? "";
}

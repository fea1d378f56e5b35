import path from "node:path";

export function isoNow(): string {
  return new Date().toISOString();
}

export function defaultRunId(date: Date = new Date()): string {
  // YYYYMMDD-HHMMSS
  const yyyy = date.getUTCFullYear();
  const mm = String(date.getUTCMonth() + 1).padStart(2, "0");
  const dd = String(date.getUTCDate()).padStart(2, "0");
  const hh = String(date.getUTCHours()).padStart(2, "0");
  const mi = String(date.getUTCMinutes()).padStart(2, "0");
  const ss = String(date.getUTCSeconds()).padStart(2, "0");
  return `${yyyy}${mm}${dd}-${hh}${mi}${ss}`;
}

export function toPosixPath(input: string): string {
  return input.split(path.sep).join("/");
}

export function uniqSorted(values: Iterable<string>): string[] {
  return Array.from(new Set(values)).sort();
}

export function isInsideDir(baseDir: string, targetPath: string): boolean {
  const relative = path.relative(path.resolve(baseDir), path.resolve(targetPath));
  return relative !== "" && !relative.startsWith("..") && !path.isAbsolute(relative);
}

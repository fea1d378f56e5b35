// Reader for `.properties` text (the format of META-INF/spring.factories).
// Purpose: turn logical lines into key/value pairs with the usual escape rules.
// Assumes the file is read as UTF-8; \uXXXX escapes are decoded here.

// =============================================================================
// CONSTANTS
// =============================================================================

const WHITESPACE = new Set([" ", "\t", "\f"]);
const SEPARATORS = new Set(["=", ":"]);
const SIMPLE_ESCAPES: Record<string, string> = { t: "\t", n: "\n", r: "\r", f: "\f" };

// =============================================================================
// PUBLIC API
// =============================================================================

export function parseProperties(text: string): Map<string, string> {
  const entries = new Map<string, string>();

  for (const line of logicalLines(text)) {
    const { key, value } = splitKeyValue(line);
    entries.set(unescapeProperty(key), unescapeProperty(value));
  }

  return entries;
}

export function unescapeProperty(raw: string): string {
  let out = "";

  for (let i = 0; i < raw.length; i++) {
    const ch = raw[i];
    if (ch !== "\\" || i === raw.length - 1) {
      out += ch;
      continue;
    }

    const next = raw[++i];
    if (next === "u") {
      const hex = raw.slice(i + 1, i + 5);
      if (!/^[0-9a-fA-F]{4}$/.test(hex)) {
        throw new Error(`Malformed \\uxxxx escape in properties value: \\u${hex}`);
      }
      out += String.fromCharCode(parseInt(hex, 16));
      i += 4;
      continue;
    }

    out += SIMPLE_ESCAPES[next] ?? next;
  }

  return out;
}

// =============================================================================
// INTERNALS
// =============================================================================

function* logicalLines(text: string): Generator<string> {
  const natural = text.split(/\r\n|\r|\n/);
  let index = 0;

  while (index < natural.length) {
    let line = stripLeadingWhitespace(natural[index++]);
    if (line === "" || line.startsWith("#") || line.startsWith("!")) {
      continue;
    }

    while (endsWithContinuation(line)) {
      line = line.slice(0, -1);
      if (index >= natural.length) break;
      line += stripLeadingWhitespace(natural[index++]);
    }

    yield line;
  }
}

function splitKeyValue(line: string): { key: string; value: string } {
  let keyEnd = 0;
  while (keyEnd < line.length) {
    const ch = line[keyEnd];
    if (ch === "\\") {
      keyEnd += 2;
      continue;
    }
    if (SEPARATORS.has(ch) || WHITESPACE.has(ch)) break;
    keyEnd++;
  }
  keyEnd = Math.min(keyEnd, line.length);

  let valueStart = skipWhitespace(line, keyEnd);
  if (valueStart < line.length && SEPARATORS.has(line[valueStart])) {
    valueStart = skipWhitespace(line, valueStart + 1);
  }

  return { key: line.slice(0, keyEnd), value: line.slice(valueStart) };
}

function skipWhitespace(line: string, from: number): number {
  let index = from;
  while (index < line.length && WHITESPACE.has(line[index])) index++;
  return index;
}

function stripLeadingWhitespace(line: string): string {
  return line.slice(skipWhitespace(line, 0));
}

// An odd run of trailing backslashes continues the line; an even run is escaped backslashes.
function endsWithContinuation(line: string): boolean {
  let count = 0;
  for (let i = line.length - 1; i >= 0 && line[i] === "\\"; i--) count++;
  return count % 2 === 1;
}

/**
 * Mechanical hygiene for pasted generator output before JSON parsing:
 * code fences, BEGIN/END markers, markdown link debris, curly quotes,
 * trailing commas and prose around the object.
 */

const WRAPPER_LINES = new Set(['BEGIN JSON', 'END JSON', 'BEGIN MARKDOWN', 'END MARKDOWN']);
const SNIPPET_RADIUS = 60;

export interface PrecleanTextOptions {
  aggressive?: boolean;
}

export interface ParseTextOptions {
  /** Run the normal preclean before the first parse attempt. */
  preclean?: boolean;
}

export class PeopleParseError extends Error {
  constructor(
    readonly line: number,
    readonly column: number,
    readonly snippet: string,
  ) {
    super(`JSON parse failed even after aggressive preclean. line=${line} col=${column}`);
    this.name = 'PeopleParseError';
  }
}

// ============================================================================
// Preclean steps
// ============================================================================

export function stripBom(text: string): string {
  return text.replace(/^\uFEFF+/, '');
}

export function stripWrappers(text: string): string {
  return text
    .split(/\r\n|\r|\n/)
    .filter((line) => {
      const l = line.trim();
      return !l.startsWith('```') && !WRAPPER_LINES.has(l.toUpperCase());
    })
    .join('\n');
}

export function replaceCurlyQuotes(text: string): string {
  return text.replace(/[\u201C\u201D]/g, '"').replace(/[\u2018\u2019]/g, "'");
}

export function unwrapMarkdownLinks(text: string): string {
  return text
    .replace(/\[([^\]]+)\]\((https?:\/\/[^\s)]+)\)/g, '$2')
    .replace(/\[(https?:\/\/[^\]\s)]+)\]/g, '$1')
    .replaceAll('"[https://', '"https://')
    .replaceAll('](', '')
    .replaceAll(')]', ')');
}

export function normalizeCtgovInText(text: string): string {
  return text.replace(
    /https:\/\/clinicaltrials\.gov\/ct2\/show\/(NCT[0-9]{8})/g,
    'https://clinicaltrials.gov/study/$1',
  );
}

export function upgradeQuotedHttp(text: string): string {
  return text.replaceAll('"http://', '"https://');
}

export function stripTrailingCommas(text: string): string {
  return text.replace(/,(\s*[}\]])/g, '$1');
}

/**
 * First balanced top-level `{...}`, ignoring braces inside strings.
 * Returns '' when there is no opening brace or it never closes.
 */
export function extractFirstJsonObject(text: string): string {
  const start = text.indexOf('{');
  if (start === -1) return '';
  let depth = 0;
  let inString = false;
  let escaped = false;
  for (let i = start; i < text.length; i++) {
    const ch = text[i];
    if (inString) {
      if (escaped) escaped = false;
      else if (ch === '\\') escaped = true;
      else if (ch === '"') inString = false;
    } else if (ch === '"') {
      inString = true;
    } else if (ch === '{') {
      depth++;
    } else if (ch === '}') {
      depth--;
      if (depth === 0) return text.slice(start, i + 1);
    }
  }
  return '';
}

export function precleanText(raw: string, options: PrecleanTextOptions = {}): string {
  let t = stripBom(raw);
  t = stripWrappers(t);
  t = unwrapMarkdownLinks(t);
  t = normalizeCtgovInText(t);
  t = upgradeQuotedHttp(t);

  if (options.aggressive) {
    t = replaceCurlyQuotes(t);
    const candidate = extractFirstJsonObject(t);
    if (candidate) t = candidate;
    t = stripTrailingCommas(t);
  }
  return t;
}

// ============================================================================
// Parsing
// ============================================================================

/**
 * Two-pass parse: optional normal preclean first, then one aggressive retry
 * on the raw text. Throws PeopleParseError when both fail.
 */
export function parsePeopleText(raw: string, options: ParseTextOptions = {}): unknown {
  const text = options.preclean ? precleanText(raw) : raw;
  try {
    return JSON.parse(text);
  } catch {
    const retry = precleanText(raw, { aggressive: true });
    try {
      return JSON.parse(retry);
    } catch {
      throw toParseError(retry);
    }
  }
}

function toParseError(text: string): PeopleParseError {
  const found = locateJsonError(text);
  const pos = found === -1 ? text.length : found;
  const before = text.slice(0, pos);
  const line = before.split('\n').length;
  const column = pos - before.lastIndexOf('\n');
  const snippet = text.slice(Math.max(0, pos - SNIPPET_RADIUS), pos + SNIPPET_RADIUS);
  return new PeopleParseError(line, column, snippet);
}

class JsonSyntaxStop {
  constructor(readonly offset: number) {}
}

const JSON_NUMBER_RE = /^-?(?:0|[1-9]\d*)(?:\.\d+)?(?:[eE][+-]?\d+)?/;
const JSON_ESCAPES = '"\\/bfnrt';

/**
 * Offset of the first JSON syntax error in `text`, or -1 when it is valid.
 * JSON.parse messages do not carry a position for every kind of error.
 */
export function locateJsonError(text: string): number {
  let i = 0;
  const stop = (): never => {
    throw new JsonSyntaxStop(i);
  };
  const skipWhitespace = () => {
    while (i < text.length && ' \t\n\r'.includes(text.charAt(i))) i++;
  };
  const literal = (word: string) => {
    for (const ch of word) {
      if (text.charAt(i) !== ch) return stop();
      i++;
    }
  };
  const string = () => {
    i++;
    while (i < text.length) {
      const ch = text.charAt(i);
      if (ch === '"') {
        i++;
        return;
      }
      if (ch === '\\') {
        const next = text.charAt(i + 1);
        if (next === 'u' && /^[0-9a-fA-F]{4}$/.test(text.slice(i + 2, i + 6))) i += 6;
        else if (next !== 'u' && next !== '' && JSON_ESCAPES.includes(next)) i += 2;
        else {
          i++;
          return stop();
        }
        continue;
      }
      if (ch < ' ') return stop();
      i++;
    }
    return stop();
  };
  const number = () => {
    const m = JSON_NUMBER_RE.exec(text.slice(i));
    if (!m) return stop();
    i += m[0].length;
  };
  const members = (close: string, member: () => void) => {
    i++;
    skipWhitespace();
    if (text.charAt(i) === close) {
      i++;
      return;
    }
    for (;;) {
      member();
      skipWhitespace();
      const ch = text.charAt(i);
      if (ch === close) {
        i++;
        return;
      }
      if (ch !== ',') return stop();
      i++;
    }
  };
  const value = (): void => {
    skipWhitespace();
    const ch = text.charAt(i);
    if (ch === '{') {
      return members('}', () => {
        skipWhitespace();
        if (text.charAt(i) !== '"') return stop();
        string();
        skipWhitespace();
        if (text.charAt(i) !== ':') return stop();
        i++;
        value();
      });
    }
    if (ch === '[') return members(']', value);
    if (ch === '"') return string();
    if (ch === 't') return literal('true');
    if (ch === 'f') return literal('false');
    if (ch === 'n') return literal('null');
    if (ch === '-' || (ch >= '0' && ch <= '9')) return number();
    return stop();
  };

  try {
    value();
    skipWhitespace();
    if (i < text.length) stop();
    return -1;
  } catch (err) {
    if (err instanceof JsonSyntaxStop) return err.offset;
    throw err;
  }
}

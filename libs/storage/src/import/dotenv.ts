/**
 * Line-oriented `KEY=value` parser for `shrine import`
 */

import { FormatError } from '@shrine/ipc';

export interface ImportEntry {
  key: string;
  value: string;
  line: number;
}

const EXPORT_PREFIX = /^export\s+/;

function stripInlineComment(raw: string): string {
  let out = '';
  for (let i = 0; i < raw.length; i++) {
    const ch = raw[i];
    if (ch === '\\' && raw[i + 1] === '#') {
      out += '#';
      i++;
      continue;
    }
    if (ch === '#') break;
    out += ch;
  }
  return out.trim();
}

function parseValue(raw: string): string {
  const quote = raw[0];
  if (quote === '"' || quote === "'") {
    const end = raw.indexOf(quote, 1);
    if (end !== -1) {
      return raw.slice(1, end);
    }
  }
  return stripInlineComment(raw);
}

/**
 * Parse import content. Later entries with the same key win.
 *
 * - `KEY=value` split at the first `=`; key and value are trimmed
 * - optional leading `export `
 * - unquoted values end at the first `#` not written as `\#`
 * - `"..."` and `'...'` values are taken verbatim
 * - blank lines and `#` comment lines are skipped
 */
export function parseImportLines(content: string): ImportEntry[] {
  const entries: ImportEntry[] = [];
  const lines = content.split(/\r?\n/);

  lines.forEach((rawLine, index) => {
    const lineNo = index + 1;
    const line = rawLine.trim();
    if (line === '' || line.startsWith('#')) return;

    const eq = line.indexOf('=');
    if (eq === -1) {
      throw new FormatError(`Line ${lineNo}: expected KEY=value`);
    }

    const key = line.slice(0, eq).trim().replace(EXPORT_PREFIX, '');
    if (key === '') {
      throw new FormatError(`Line ${lineNo}: empty key`);
    }

    entries.push({ key, value: parseValue(line.slice(eq + 1).trim()), line: lineNo });
  });

  return entries;
}

import { InputError } from '../utils/errors';

export interface UploadedFile {
  originalname: string;
  buffer: Buffer;
}

function dedupe(tokens: Iterable<string>): string[] {
  const seen = new Set<string>();
  const out: string[] = [];
  for (const token of tokens) {
    if (seen.has(token)) continue;
    seen.add(token);
    out.push(token);
  }
  return out;
}

function tokenize(text: string, separators: RegExp): string[] {
  return text
    .split(separators)
    .map((t) => t.trim())
    .filter((t) => t.length > 0);
}

/** Comma- or newline-separated numbers typed into the form. */
export function parseNumberText(text: string): string[] {
  return dedupe(tokenize(text, /[,\r\n]+/));
}

// Separators inside double quotes belong to the cell; "" is a literal quote.
function splitRow(line: string): string[] {
  const cells: string[] = [];
  let cell = '';
  let quoted = false;
  for (let i = 0; i < line.length; i++) {
    const ch = line[i];
    if (quoted) {
      if (ch === '"' && line[i + 1] === '"') {
        cell += '"';
        i++;
      } else if (ch === '"') {
        quoted = false;
      } else {
        cell += ch;
      }
    } else if (ch === '"') {
      quoted = true;
    } else if (ch === ',' || ch === ';' || ch === '\t') {
      cells.push(cell);
      cell = '';
    } else {
      cell += ch;
    }
  }
  cells.push(cell);
  return cells;
}

/**
 * Plain text or a CSV/TSV table. Cells without a single digit are column
 * labels or names and are skipped.
 */
export function parseNumberFile(file: UploadedFile): string[] {
  const text = file.buffer.toString('utf-8').replace(/^\uFEFF/, '');
  const cells = text
    .split(/\r\n|\r|\n/)
    .flatMap(splitRow)
    .map((cell) => cell.trim())
    .filter((cell) => /\d/.test(cell));
  return dedupe(cells);
}

export function collectCandidates(sources: { text?: string; file?: UploadedFile }): string[] {
  const fromText = sources.text ? parseNumberText(sources.text) : [];
  const fromFile = sources.file ? parseNumberFile(sources.file) : [];
  const candidates = dedupe([...fromText, ...fromFile]);
  if (candidates.length === 0) {
    throw new InputError('No valid phone numbers provided');
  }
  return candidates;
}

// Markdown helpers for reading generated output

/**
 * A heading outside fenced code
 */
export interface MarkdownHeading {
  level: number;
  title: string;
  /** 0-indexed line */
  index: number;
}

/**
 * A section located by one of its accepted headings
 */
export interface LocatedSection {
  heading: MarkdownHeading;
  /** Lines under the heading, up to the next heading of the same or higher level */
  lines: string[];
  /** 0-indexed line of the first content line */
  startIndex: number;
}

export interface MarkdownTableRow {
  cells: string[];
  /** 0-indexed line */
  index: number;
}

export interface MarkdownTable {
  header: string[];
  rows: MarkdownTableRow[];
  /** 0-indexed line of the header row */
  index: number;
}

export interface FencedBlock {
  content: string;
  /** 0-indexed line of the opening fence */
  index: number;
}

const HEADING_RE = /^(#{1,6})\s+(.+?)\s*#*\s*$/;
const FENCE_RE = /^\s*(`{3,}|~{3,})/;
const TABLE_SEPARATOR_RE = /^\s*\|?\s*:?-{3,}:?\s*(\|\s*:?-{3,}:?\s*)*\|?\s*$/;

/**
 * Lowercases, strips accents, emphasis, numbering and trailing colons so
 * "**1. Resumo Executivo:**" and "resumo executivo" compare equal
 */
export function normalizeLabel(text: string): string {
  return text
    .normalize('NFD')
    .replace(/[\u0300-\u036f]/g, '')
    .replace(/[*_`]/g, '')
    .toLowerCase()
    .replace(/^\s*(?:\d+|[a-z])[.)]\s+/, '')
    .replace(/\s+/g, ' ')
    .replace(/[\s:.-]+$/, '')
    .trim();
}

/**
 * True when a label equals an alias or starts with it followed by a
 * non-alphanumeric character ("Segurança (OWASP)" matches "Segurança")
 */
export function matchesLabel(text: string, aliases: readonly string[]): boolean {
  const normalized = normalizeLabel(text);
  return aliases.some(alias => {
    const a = normalizeLabel(alias);
    if (normalized === a) return true;
    return normalized.startsWith(a) && /^[^a-z0-9]/.test(normalized.slice(a.length));
  });
}

/**
 * Splits text into lines, normalizing CRLF
 */
export function toLines(text: string): string[] {
  return text.replace(/\r\n/g, '\n').split('\n');
}

/**
 * Marks the lines that sit inside fenced code blocks (fences included)
 */
function fencedLineMask(lines: string[]): boolean[] {
  const mask: boolean[] = [];
  let fence: string | null = null;

  for (const line of lines) {
    const match = FENCE_RE.exec(line);
    if (fence === null) {
      if (match) {
        fence = match[1];
        mask.push(true);
      } else {
        mask.push(false);
      }
    } else {
      mask.push(true);
      if (match && match[1][0] === fence[0] && match[1].length >= fence.length && line.trim() === match[1]) {
        fence = null;
      }
    }
  }

  return mask;
}

/**
 * Lists headings, ignoring `#` lines inside fenced code
 */
export function parseHeadings(lines: string[]): MarkdownHeading[] {
  const mask = fencedLineMask(lines);
  const headings: MarkdownHeading[] = [];

  lines.forEach((line, index) => {
    if (mask[index]) return;
    const match = HEADING_RE.exec(line);
    if (match) {
      headings.push({ level: match[1].length, title: match[2], index });
    }
  });

  return headings;
}

/**
 * Finds the first heading matching any alias and returns its content
 */
export function findSection(lines: string[], headings: MarkdownHeading[], aliases: readonly string[]): LocatedSection | undefined {
  const position = headings.findIndex(h => matchesLabel(h.title, aliases));
  if (position === -1) return undefined;

  const heading = headings[position];
  const next = headings.slice(position + 1).find(h => h.level <= heading.level);
  const end = next ? next.index : lines.length;

  return {
    heading,
    lines: lines.slice(heading.index + 1, end),
    startIndex: heading.index + 1
  };
}

/**
 * Splits a table row into trimmed cells, honoring `\|` escapes
 */
export function splitTableRow(line: string): string[] {
  let row = line.trim();
  if (row.startsWith('|')) row = row.slice(1);
  if (row.endsWith('|') && !row.endsWith('\\|')) row = row.slice(0, -1);

  return row.split(/(?<!\\)\|/).map(cell => cell.trim().replace(/\\\|/g, '|'));
}

/**
 * Finds the first pipe table in a block of lines
 *
 * @param offset - 0-indexed line of lines[0] in the whole document
 */
export function findTable(lines: string[], offset = 0): MarkdownTable | undefined {
  for (let i = 0; i + 1 < lines.length; i++) {
    if (!lines[i].includes('|') || !TABLE_SEPARATOR_RE.test(lines[i + 1])) continue;

    const rows: MarkdownTableRow[] = [];
    for (let j = i + 2; j < lines.length; j++) {
      const line = lines[j];
      if (line.trim() === '' || !line.includes('|')) break;
      rows.push({ cells: splitTableRow(line), index: offset + j });
    }

    return { header: splitTableRow(lines[i]), rows, index: offset + i };
  }

  return undefined;
}

/**
 * Extracts the contents of fenced code blocks. An unterminated fence runs
 * to the end of the text.
 */
export function extractFencedBlocks(text: string): FencedBlock[] {
  const lines = toLines(text);
  const blocks: FencedBlock[] = [];
  let fence: string | null = null;
  let openIndex = 0;
  let content: string[] = [];

  for (let index = 0; index < lines.length; index++) {
    const line = lines[index];
    const match = FENCE_RE.exec(line);

    if (fence === null) {
      if (match) {
        fence = match[1];
        openIndex = index;
        content = [];
      }
      continue;
    }

    if (match && match[1][0] === fence[0] && match[1].length >= fence.length && line.trim() === match[1]) {
      blocks.push({ content: content.join('\n'), index: openIndex });
      fence = null;
      continue;
    }

    content.push(line);
  }

  if (fence !== null) {
    blocks.push({ content: content.join('\n'), index: openIndex });
  }

  return blocks;
}

import { parse as parseYaml, stringify as stringifyYaml } from 'yaml';
import { NotebookFormatError } from './errors.js';
import type { CellType, Notebook, NotebookCell, NotebookMetadata } from './types.js';

/**
 * Identifies a notebook text format by name and source file extension
 */
export interface NotebookFormat {
  name: string;
  extension: string;
}

/**
 * MyST-flavoured R Markdown notebooks
 */
export const NOTEBOOK_FORMAT: NotebookFormat = {
  name: 'extended-markdown-notebook',
  extension: '.Rmd',
};

// Code chunk opening: ```{python} or ```{python label, echo=FALSE}
const CHUNK_START_PATTERN = /^```\{(?<lang>[A-Za-z][\w-]*)(?<options>[^}]*)\}[ \t]*$/;
const CHUNK_END_PATTERN = /^```[ \t]*$/;

// Explicit cell regions: <!-- #region --> ... <!-- #endregion -->, <!-- #raw --> ... <!-- #endraw -->
const REGION_START_PATTERN = /^<!--\s*#(?<kind>region|raw)\b.*-->[ \t]*$/;

const HEADER_DELIMITER_PATTERN = /^---[ \t]*$/;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isBlank(line: string): boolean {
  return line.trim() === '';
}

/**
 * Drop blank lines at either end of a block of lines
 */
function trimBlankLines(lines: string[]): string[] {
  let start = 0;
  let end = lines.length;
  while (start < end && isBlank(lines[start])) start++;
  while (end > start && isBlank(lines[end - 1])) end--;
  return lines.slice(start, end);
}

/**
 * Parse one chunk option value the way R writes them: TRUE/FALSE, numbers,
 * quoted strings; anything else is kept as written
 */
function parseOptionValue(value: string): unknown {
  if (value === 'TRUE' || value === 'T') return true;
  if (value === 'FALSE' || value === 'F') return false;
  if (/^-?\d+(?:\.\d+)?$/.test(value)) return Number(value);
  const quoted = value.match(/^(["'])(.*)\1$/);
  if (quoted) return quoted[2];
  return value;
}

/**
 * Parse the options of a chunk header into cell metadata.
 * A leading bare word is the chunk label.
 */
export function parseChunkOptions(options: string): Record<string, unknown> {
  const metadata: Record<string, unknown> = {};
  const parts = options.split(',').map(part => part.trim()).filter(Boolean);

  parts.forEach((part, index) => {
    const eq = part.indexOf('=');
    if (eq < 0) {
      if (index === 0) {
        metadata['name'] = part;
      }
      return;
    }
    const key = part.slice(0, eq).trim();
    if (key) {
      metadata[key] = parseOptionValue(part.slice(eq + 1).trim());
    }
  });

  return metadata;
}

interface Header {
  metadata: NotebookMetadata;
  /** Header keys other than `jupyter`, kept as a raw cell */
  rawCell?: NotebookCell;
  /** First line after the header */
  bodyStart: number;
}

function readHeader(lines: string[]): Header {
  if (lines.length === 0 || !HEADER_DELIMITER_PATTERN.test(lines[0])) {
    return { metadata: {}, bodyStart: 0 };
  }
  const close = lines.findIndex((line, i) => i > 0 && HEADER_DELIMITER_PATTERN.test(line));
  if (close < 0) {
    return { metadata: {}, bodyStart: 0 };
  }

  const parsed: unknown = parseYaml(lines.slice(1, close).join('\n'));
  if (!isRecord(parsed)) {
    return { metadata: {}, bodyStart: close + 1 };
  }

  const { jupyter, ...rest } = parsed;
  const header: Header = { metadata: {}, bodyStart: close + 1 };
  if (isRecord(jupyter)) {
    Object.assign(header.metadata, jupyter);
  }
  if (Object.keys(rest).length > 0) {
    header.rawCell = {
      cell_type: 'raw',
      source: `---\n${stringifyYaml(rest)}---`,
      metadata: {},
    };
  }
  return header;
}

/**
 * Split loose markdown into cells at runs of two or more blank lines
 */
function splitMarkdown(lines: string[]): string[][] {
  const cells: string[][] = [];
  let current: string[] = [];
  let blankRun = 0;

  for (const line of lines) {
    if (isBlank(line)) {
      blankRun++;
      current.push(line);
      continue;
    }
    if (blankRun >= 2) {
      cells.push(current);
      current = [];
    }
    blankRun = 0;
    current.push(line);
  }
  cells.push(current);

  return cells.map(trimBlankLines).filter(cell => cell.length > 0);
}

function cell(cellType: CellType, lines: string[], metadata: Record<string, unknown> = {}): NotebookCell {
  return { cell_type: cellType, source: lines.join('\n'), metadata };
}

function findLine(lines: string[], from: number, pattern: RegExp): number {
  for (let i = from; i < lines.length; i++) {
    if (pattern.test(lines[i])) return i;
  }
  return -1;
}

/**
 * Read notebook text into cells and metadata.
 *
 * Code chunks become code cells, `<!-- #region -->` and `<!-- #raw -->` blocks
 * become one cell each, and the remaining markdown is split into cells at runs
 * of two or more blank lines.
 */
export function readNotebook(text: string, format: NotebookFormat = NOTEBOOK_FORMAT): Notebook {
  if (format.name !== NOTEBOOK_FORMAT.name) {
    throw new NotebookFormatError(`Unsupported notebook format: ${format.name}`);
  }
  if (format.extension.toLowerCase() !== NOTEBOOK_FORMAT.extension.toLowerCase()) {
    throw new NotebookFormatError(`Unsupported extension for ${format.name}: ${format.extension}`);
  }

  const lines = text.replace(/\r\n|\r/g, '\n').split('\n');
  const header = readHeader(lines);
  const cells: NotebookCell[] = header.rawCell ? [header.rawCell] : [];
  let markdown: string[] = [];

  function flushMarkdown(): void {
    for (const block of splitMarkdown(markdown)) {
      cells.push(cell('markdown', block));
    }
    markdown = [];
  }

  let i = header.bodyStart;
  while (i < lines.length) {
    const line = lines[i];

    const chunk = CHUNK_START_PATTERN.exec(line);
    if (chunk?.groups) {
      flushMarkdown();
      const end = findLine(lines, i + 1, CHUNK_END_PATTERN);
      const stop = end < 0 ? lines.length : end;
      const metadata = parseChunkOptions(chunk.groups.options);
      const language = chunk.groups.lang.toLowerCase();
      if (language !== 'python') {
        metadata['language'] = language;
      }
      cells.push(cell('code', lines.slice(i + 1, stop), metadata));
      i = stop + 1;
      continue;
    }

    const region = REGION_START_PATTERN.exec(line);
    if (region?.groups) {
      flushMarkdown();
      const kind = region.groups.kind;
      const end = findLine(lines, i + 1, new RegExp(`^<!--\\s*#end${kind}\\s*-->[ \\t]*$`));
      const stop = end < 0 ? lines.length : end;
      cells.push(cell(kind === 'raw' ? 'raw' : 'markdown', trimBlankLines(lines.slice(i + 1, stop))));
      i = stop + 1;
      continue;
    }

    markdown.push(line);
    i++;
  }
  flushMarkdown();

  return { cells, metadata: header.metadata, nbformat: 4, nbformat_minor: 4 };
}

/**
 * Split cell source into the line list stored in .ipynb files
 */
function sourceLines(source: string): string[] {
  const lines = source.split('\n');
  return lines
    .map((line, index) => (index < lines.length - 1 ? `${line}\n` : line))
    .filter(line => line !== '');
}

/**
 * Serialize a notebook as nbformat 4 JSON
 */
export function writeNotebook(notebook: Notebook): string {
  const cells = notebook.cells.map(c => (
    c.cell_type === 'code'
      ? {
        cell_type: c.cell_type,
        execution_count: null,
        metadata: c.metadata,
        outputs: [],
        source: sourceLines(c.source),
      }
      : {
        cell_type: c.cell_type,
        metadata: c.metadata,
        source: sourceLines(c.source),
      }
  ));

  const document = {
    cells,
    metadata: notebook.metadata,
    nbformat: notebook.nbformat,
    nbformat_minor: notebook.nbformat_minor,
  };
  return JSON.stringify(document, null, 1) + '\n';
}

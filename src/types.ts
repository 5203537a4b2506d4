/**
 * Severity of a parser diagnostic, from least to most serious.
 */
export const SEVERITIES = ['info', 'warning', 'error', 'severe'] as const;

export type Severity = typeof SEVERITIES[number];

/**
 * A problem noticed while parsing markup.
 */
export interface Diagnostic {
  level: Severity;
  message: string;
  /** Line the problem was found on (1-based) */
  line: number;
}

/**
 * Fields shared by every node of the block tree.
 */
interface BaseNode {
  /** Line the node starts on (1-based) */
  line: number;

  /** Nested blocks. Only admonition bodies are parsed into children. */
  children: BlockNode[];
}

/**
 * An admonition block: a fenced `{note}`-style directive or an HTML admonition div.
 */
export interface AdmonitionNode extends BaseNode {
  kind: 'admonition';

  /** Admonition type tag, e.g. "note" or "warning" */
  admonitionType: string;

  /** Free text after the type tag, if any */
  title?: string;

  /** How the block was written */
  syntax: 'fence' | 'html';
}

/**
 * A fenced directive that is not an admonition (code chunks, figures, ...).
 * Its body is kept as opaque text.
 */
export interface DirectiveNode extends BaseNode {
  kind: 'directive';
  name: string;
  args: string;
  body: string;
}

/**
 * Any other block the lexer recognises (paragraph, heading, code, math, ...).
 */
export interface GenericNode extends BaseNode {
  kind: 'block';

  /** Lexer token type, e.g. "paragraph" or "deflist" */
  blockType: string;

  /** Plain inline text of the block, when it has any */
  text?: string;

  /** Names referenced as `{{ name }}` substitutions inside the block */
  substitutions?: string[];
}

export type BlockNode = AdmonitionNode | DirectiveNode | GenericNode;

/**
 * Structural parse of one document snapshot.
 */
export interface DocumentTree {
  children: BlockNode[];

  /** Number of lines in the parsed text */
  lineCount: number;

  /** Diagnostics below the halt level */
  diagnostics: Diagnostic[];
}

/**
 * Lines bounding one admonition block in a document snapshot.
 * Both indices are 0-based; startLine < endLine.
 */
export interface AdmonitionSpan {
  /** Line of the opening fence */
  startLine: number;

  /** Line of the matching closing fence */
  endLine: number;

  /** Admonition type tag */
  type: string;

  /** Title text from the opening line, if present */
  title?: string;
}

export type MarkerKind = 'exercise' | 'solution';

export type MarkerBoundary = 'start' | 'end';

/**
 * An exercise/solution marker found in raw text.
 */
export interface Marker {
  kind: MarkerKind;
  boundary: MarkerBoundary;

  /** Text after the braced tag on the marker line, e.g. a label */
  suffix: string;

  /** `:key: value` attribute lines following the marker (consumed on rewrite) */
  attributes: Record<string, string>;

  /** Line of the marker fence (0-based) */
  line: number;
}

export type CellType = 'markdown' | 'code' | 'raw';

/**
 * A notebook cell. Field names follow the nbformat JSON layout.
 */
export interface NotebookCell {
  cell_type: CellType;
  source: string;
  metadata: Record<string, unknown>;
}

export interface KernelSpec {
  name: string;
  display_name: string;
}

export interface NotebookMetadata {
  kernelspec?: KernelSpec;
  [key: string]: unknown;
}

/**
 * A notebook: ordered cells plus a metadata map.
 */
export interface Notebook {
  cells: NotebookCell[];
  metadata: NotebookMetadata;
  nbformat: 4;
  nbformat_minor: number;
}

import { StructuralParseError } from './errors.js';
import { parseMarkup, type ParseOptions } from './parser.js';
import type { AdmonitionSpan, BlockNode } from './types.js';

// A fence-only line: three or more colons, backticks or tildes
const CLOSING_FENCE_PATTERN = /^\s*[:`~]{3,}\s*$/;

// Opening line of an admonition: optional fence, braced type tag, free title
// Group type: the tag inside the braces
// Group title: the rest of the line (may be empty)
const ADMONITION_HEADER_PATTERN = /^\s*(?:[:`~]{3,})?\s*\{(?<type>[^}]+)\}\s*(?<title>.*?)\s*$/;

/**
 * Find the closing fence of an admonition by scanning up from `scanFrom`.
 * The line right after the opening fence is never taken as the closing fence.
 */
function findClosingFence(lines: string[], startLine: number, scanFrom: number): number {
  for (let i = Math.min(scanFrom, lines.length - 1); i > startLine + 1; i--) {
    if (CLOSING_FENCE_PATTERN.test(lines[i])) {
      return i;
    }
  }
  throw new StructuralParseError('could not find end of admonition', startLine + 1);
}

/**
 * Resolve spans for the admonitions among `nodes`, then for their children.
 * A node without a following sibling is bounded by `enclosingBound`: the line
 * above its parent's closing fence, or the last line of the document.
 */
function collectSpans(nodes: BlockNode[], enclosingBound: number, lines: string[], spans: AdmonitionSpan[]): void {
  nodes.forEach((node, index) => {
    if (node.kind !== 'admonition') return;

    const startLine = node.line - 1;
    const next = nodes[index + 1];
    const scanFrom = next ? next.line - 2 : enclosingBound;
    const endLine = findClosingFence(lines, startLine, scanFrom);

    spans.push({ startLine, endLine, type: node.admonitionType, title: node.title });
    collectSpans(node.children, endLine - 1, lines, spans);
  });
}

/**
 * Locate every admonition block in a document snapshot.
 * Spans are in document order; an outer block comes before the blocks it contains.
 */
export function locateAdmonitions(text: string, options: ParseOptions = {}): AdmonitionSpan[] {
  const tree = parseMarkup(text, options);
  const lines = text.replace(/\r\n|\r/g, '\n').split('\n');
  const spans: AdmonitionSpan[] = [];
  collectSpans(tree.children, lines.length - 1, lines, spans);
  return spans;
}

/**
 * Replace the opening and closing lines of each admonition with plain
 * bracketing text. Every other line is returned unchanged.
 */
export function rewriteAdmonitions(text: string, options: ParseOptions = {}): string {
  const spans = locateAdmonitions(text, options);
  if (spans.length === 0) {
    return text;
  }

  // Line i is parts[2 * i], followed by its line break; one line in, one line out
  const parts = text.split(/(\r\n|\r|\n)/);
  for (const span of spans) {
    const opening = parts[2 * span.startLine];
    const header = ADMONITION_HEADER_PATTERN.exec(opening);
    if (!header?.groups) {
      throw new StructuralParseError(`unexpected admonition header "${opening.trim()}"`, span.startLine + 1);
    }

    const type = header.groups.type.trim();
    const title = header.groups.title;
    parts[2 * span.startLine] = title ? `**Start of ${type}: ${title}**` : `**Start of ${type}**`;
    parts[2 * span.endLine] = `**End of ${type}**`;
  }

  return parts.join('');
}

import { Lexer, Marked, type Token } from 'marked';
import { StructuralParseError } from './errors.js';
import {
  ADMONITION_NAMES,
  CHUNK_LANGUAGES,
  KNOWN_DIRECTIVES,
  MARKUP_EXTENSIONS,
  type MarkupExtension,
  isDirectiveToken,
  isSubstitutionToken,
  markupExtension,
  typeset,
} from './extensions.js';
import { SEVERITIES, type BlockNode, type Diagnostic, type DocumentTree, type GenericNode, type Severity } from './types.js';

/**
 * Options for parsing markup
 */
export interface ParseOptions {
  /** Markup extensions to enable (default: MARKUP_EXTENSIONS) */
  extensions?: readonly MarkupExtension[];
  /** Diagnostics at or above this level abort the parse (default: 'severe') */
  haltLevel?: Severity;
  /** Called with each diagnostic that did not abort the parse */
  onDiagnostic?: (diagnostic: Diagnostic) => void;
}

// Matches the class attribute of an HTML admonition: <div class="admonition note">
const HTML_ADMONITION_PATTERN = /^ {0,3}<div\b[^>]*\bclass\s*=\s*["']([^"']*)["']/i;

const HTML_TITLE_PATTERN = /<p\b[^>]*\bclass\s*=\s*["'][^"']*\btitle\b[^"']*["'][^>]*>([\s\S]*?)<\/p>/i;

const PROSE_BLOCKS: ReadonlySet<string> = new Set(['paragraph', 'heading', 'deflist']);

interface BuildContext {
  extensions: readonly MarkupExtension[];
  diagnostics: Diagnostic[];
}

function report(ctx: BuildContext, level: Severity, message: string, line: number): void {
  ctx.diagnostics.push({ level, message, line });
}

function countNewlines(text: string): number {
  let count = 0;
  for (let i = text.indexOf('\n'); i >= 0; i = text.indexOf('\n', i + 1)) {
    count++;
  }
  return count;
}

function isKnownDirective(name: string): boolean {
  const firstWord = name.split(/[\s,]/, 1)[0];
  return KNOWN_DIRECTIVES.has(name) || CHUNK_LANGUAGES.has(firstWord.toLowerCase());
}

function collectSubstitutions(tokens: Token[], found: string[]): void {
  for (const token of tokens) {
    if (isSubstitutionToken(token)) {
      found.push(token.name);
    } else if ('tokens' in token && Array.isArray(token.tokens)) {
      collectSubstitutions(token.tokens, found);
    }
  }
}

/**
 * Read type and title from an HTML admonition block, or null if it is not one
 */
function parseHtmlAdmonition(raw: string): { admonitionType?: string; title?: string } | null {
  const match = raw.match(HTML_ADMONITION_PATTERN);
  if (!match) return null;
  const classes = match[1].split(/\s+/).filter(Boolean);
  if (!classes.includes('admonition')) return null;
  const title = raw.match(HTML_TITLE_PATTERN)?.[1].trim();
  return {
    admonitionType: classes.find(c => c !== 'admonition'),
    title: title || undefined,
  };
}

function toNode(token: Token, line: number, ctx: BuildContext): BlockNode | null {
  if (token.type === 'space') return null;

  if (isDirectiveToken(token)) {
    if (!token.closed) {
      report(ctx, 'warning', `directive {${token.name}} is not closed`, line);
    }
    if (ADMONITION_NAMES.has(token.name)) {
      return {
        kind: 'admonition',
        admonitionType: token.name,
        title: token.args || undefined,
        syntax: 'fence',
        line,
        // Body starts on the line after the opening fence
        children: buildNodes(token.tokens, line + 1, ctx),
      };
    }
    if (!isKnownDirective(token.name)) {
      report(ctx, 'error', `unknown directive type "${token.name}"`, line);
    }
    return { kind: 'directive', name: token.name, args: token.args, body: token.body, line, children: [] };
  }

  if (token.type === 'html' && ctx.extensions.includes('html_admonition')) {
    const admonition = parseHtmlAdmonition(token.raw);
    if (admonition) {
      if (!admonition.admonitionType) {
        report(ctx, 'warning', 'HTML admonition has no type class', line);
      }
      return {
        kind: 'admonition',
        admonitionType: admonition.admonitionType ?? 'admonition',
        title: admonition.title,
        syntax: 'html',
        line,
        children: [],
      };
    }
  }

  const text = 'text' in token && typeof token.text === 'string' ? token.text : undefined;
  const node: GenericNode = {
    kind: 'block',
    blockType: token.type,
    text: text !== undefined && PROSE_BLOCKS.has(token.type) ? typeset(text, ctx.extensions) : text,
    line,
    children: [],
  };

  if ('tokens' in token && Array.isArray(token.tokens)) {
    const substitutions: string[] = [];
    collectSubstitutions(token.tokens, substitutions);
    if (substitutions.length > 0) {
      node.substitutions = substitutions;
    }
  }
  return node;
}

function buildNodes(tokens: Token[], firstLine: number, ctx: BuildContext): BlockNode[] {
  const nodes: BlockNode[] = [];
  let line = firstLine;

  for (const token of tokens) {
    const node = toNode(token, line, ctx);
    if (node) {
      nodes.push(node);
    }
    // Token raws concatenate to the lexed source, so newlines give line offsets
    line += countNewlines(token.raw);
  }

  return nodes;
}

/**
 * Create a lexer configured with the given markup extensions
 */
export function createMarkupLexer(extensions: readonly MarkupExtension[] = MARKUP_EXTENSIONS): Lexer {
  const instance = new Marked(markupExtension(extensions));
  return new Lexer(instance.defaults);
}

/**
 * Parse markup text into a block tree with 1-based source lines.
 *
 * Diagnostics below `haltLevel` are returned on the tree; the first one at or
 * above it is raised as a StructuralParseError.
 */
export function parseMarkup(text: string, options: ParseOptions = {}): DocumentTree {
  const { extensions = MARKUP_EXTENSIONS, haltLevel = 'severe', onDiagnostic } = options;

  // Normalize line endings (Windows \r\n and old Mac \r)
  const source = text.replace(/\r\n|\r/g, '\n');
  const tokens = createMarkupLexer(extensions).lex(source);

  const ctx: BuildContext = { extensions, diagnostics: [] };
  const children = buildNodes(tokens, 1, ctx);

  const threshold = SEVERITIES.indexOf(haltLevel);
  const fatal = ctx.diagnostics.find(d => SEVERITIES.indexOf(d.level) >= threshold);
  if (fatal) {
    throw new StructuralParseError(fatal.message, fatal.line);
  }

  if (onDiagnostic) {
    ctx.diagnostics.forEach(onDiagnostic);
  }

  return {
    children,
    lineCount: source.split('\n').length,
    diagnostics: ctx.diagnostics,
  };
}

/**
 * Visit every node of a tree in document order (parents before children)
 */
export function walkTree(nodes: BlockNode[], visit: (node: BlockNode) => void): void {
  for (const node of nodes) {
    visit(node);
    walkTree(node.children, visit);
  }
}

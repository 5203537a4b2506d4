import type { MarkedExtension, Token, TokenizerExtension, Tokens } from 'marked';

/**
 * Markup extensions understood by the parser. This set decides which constructs
 * count as admonitions, so it is held fixed rather than configured per document.
 */
export const MARKUP_EXTENSIONS = [
  'amsmath',
  'colon_fence',
  'deflist',
  'dollarmath',
  'fieldlist',
  'html_admonition',
  'html_image',
  'linkify',
  'replacements',
  'smartquotes',
  'strikethrough',
  'substitution',
  'tasklist',
] as const;

export type MarkupExtension = typeof MARKUP_EXTENSIONS[number];

/**
 * Directive names that produce admonition blocks.
 */
export const ADMONITION_NAMES: ReadonlySet<string> = new Set([
  'admonition',
  'attention',
  'caution',
  'danger',
  'error',
  'hint',
  'important',
  'note',
  'seealso',
  'tip',
  'warning',
]);

/**
 * Other directives a notebook page may use. Anything outside this set, the
 * admonitions and the chunk languages is reported as unknown.
 */
export const KNOWN_DIRECTIVES: ReadonlySet<string> = new Set([
  'code',
  'code-block',
  'code-cell',
  'csv-table',
  'dropdown',
  'epigraph',
  'exercise',
  'figure',
  'glossary',
  'image',
  'include',
  'list-table',
  'margin',
  'math',
  'raw',
  'sidebar',
  'solution',
  'table',
  'tabbed',
  'toctree',
]);

/**
 * Languages of executable R Markdown chunks (```{python} ... ```).
 */
export const CHUNK_LANGUAGES: ReadonlySet<string> = new Set([
  'bash',
  'js',
  'julia',
  'python',
  'r',
  'sh',
  'sql',
]);

const GFM_EXTENSIONS: ReadonlySet<MarkupExtension> = new Set(['linkify', 'strikethrough', 'tasklist']);

export interface DirectiveToken extends Tokens.Generic {
  type: 'directive';
  name: string;
  args: string;
  fence: string;
  body: string;
  closed: boolean;
  tokens: Token[];
}

export interface FrontmatterToken extends Tokens.Generic {
  type: 'frontmatter';
  text: string;
}

export interface SubstitutionToken extends Tokens.Generic {
  type: 'substitution';
  name: string;
}

export function isDirectiveToken(token: Token): token is DirectiveToken {
  return token.type === 'directive' && typeof token.name === 'string' && Array.isArray(token.tokens);
}

export function isSubstitutionToken(token: Token): token is SubstitutionToken {
  return token.type === 'substitution' && typeof token.name === 'string';
}

/**
 * Escape special regex characters in a string
 */
function escapeRegex(str: string): string {
  return str.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

// Opening fence of a directive: ```{name} args, ~~~{name} args or :::{name} args
// Group fence: the full run of fence characters
// Group ch: the fence character
// Group name: text inside the braces
// Group args: the rest of the line
const DIRECTIVE_OPEN = /^ {0,3}(?<fence>(?<ch>[`~:])\k<ch>{2,})[ \t]*\{(?<name>[^{}\n]+)\}(?<args>[^\n]*)(?:\n|$)/;

const FRONTMATTER = /^---[ \t]*\n(?<text>[\s\S]*?)\n(?:---|\.\.\.)[ \t]*(?=\n|$)/;

const DOLLAR_MATH = /^ {0,3}\$\$(?<text>[\s\S]*?)\$\$[ \t]*(?:\((?<label>[^)\n]*)\))?[ \t]*(?=\n|$)/;

const AMS_MATH = /^ {0,3}\\begin\{(?<env>[A-Za-z]+\*?)\}(?<text>[\s\S]*?)\\end\{\k<env>\}[ \t]*(?=\n|$)/;

// A term line followed by one or more ": definition" lines, each with optional
// indented continuation lines
const DEFLIST = /^ {0,3}(?<term>(?![#>:]|[`~]{3})\S[^\n]*)\n(?<defs>(?: {0,3}:[ \t]+\S[^\n]*(?:\n|$)(?:(?: {2,}|\t)\S[^\n]*(?:\n|$))*)+)/;

const FIELD_LIST = /^(?: {0,3}:[\w.-]+:(?:[ \t][^\n]*)?(?:\n|$))+/;

const FIELD_LINE = /^ {0,3}:(?<key>[\w.-]+):[ \t]*(?<value>[^\n]*)$/;

const HTML_IMAGE = /^ {0,3}<img\b(?<attrs>[^>]*)>[ \t]*(?=\n|$)/i;

const SUBSTITUTION = /^\{\{\s*(?<name>[\w.-]+)\s*\}\}/;

/**
 * Offset of the first line of `src` where `pattern` matches, so that a block
 * extension can interrupt a paragraph. `src` starts one character into the
 * paragraph, so a match at offset 0 is not at a line start and is skipped.
 * `accept` filters matches the tokenizer itself would reject.
 */
function lineStart(
  src: string,
  pattern: RegExp,
  accept: (match: RegExpMatchArray) => boolean = () => true
): number | undefined {
  for (const match of src.matchAll(new RegExp(pattern.source, 'gm'))) {
    if (match.index !== undefined && match.index > 0 && accept(match)) {
      return match.index;
    }
  }
  return undefined;
}

function directiveTokenizer(colonFence: boolean): TokenizerExtension {
  return {
    name: 'directive',
    level: 'block',
    start(src) {
      return lineStart(src, DIRECTIVE_OPEN, match => colonFence || match.groups?.ch !== ':');
    },
    tokenizer(src) {
      const open = DIRECTIVE_OPEN.exec(src);
      if (!open?.groups) return undefined;
      const { fence, ch, name, args } = open.groups;
      if (ch === ':' && !colonFence) return undefined;

      // Closed by the first line holding only the same character, at least as long
      const closing = new RegExp(`^ {0,3}${escapeRegex(ch)}{${fence.length},}[ \\t]*$`);
      const rest = src.slice(open[0].length);
      const lines = rest.split('\n');
      const closeIndex = open[0].endsWith('\n') ? lines.findIndex(line => closing.test(line)) : -1;

      const bodyLines = closeIndex < 0 ? lines : lines.slice(0, closeIndex);
      const raw = closeIndex < 0
        ? src
        : src.slice(0, open[0].length + lines.slice(0, closeIndex + 1).join('\n').length);
      const body = bodyLines.join('\n');
      const directiveName = name.trim();

      // Only admonition bodies are markup; other directive bodies stay opaque
      const tokens = ADMONITION_NAMES.has(directiveName) ? this.lexer.blockTokens(body, []) : [];

      const token: DirectiveToken = {
        type: 'directive',
        raw,
        name: directiveName,
        args: args.trim(),
        fence,
        body,
        closed: closeIndex >= 0,
        tokens,
      };
      return token;
    },
  };
}

const frontmatterTokenizer: TokenizerExtension = {
  name: 'frontmatter',
  level: 'block',
  tokenizer(src, tokens) {
    if (tokens.length > 0) return undefined;
    const match = FRONTMATTER.exec(src);
    if (!match?.groups) return undefined;
    const token: FrontmatterToken = { type: 'frontmatter', raw: match[0], text: match.groups.text };
    return token;
  },
};

const dollarMathTokenizer: TokenizerExtension = {
  name: 'dollarmath',
  level: 'block',
  start(src) {
    return lineStart(src, DOLLAR_MATH);
  },
  tokenizer(src) {
    const match = DOLLAR_MATH.exec(src);
    if (!match?.groups) return undefined;
    return { type: 'math', raw: match[0], text: match.groups.text.trim(), label: match.groups.label };
  },
};

const amsMathTokenizer: TokenizerExtension = {
  name: 'amsmath',
  level: 'block',
  start(src) {
    return lineStart(src, AMS_MATH);
  },
  tokenizer(src) {
    const match = AMS_MATH.exec(src);
    if (!match?.groups) return undefined;
    return { type: 'math', raw: match[0], text: match.groups.text.trim(), environment: match.groups.env };
  },
};

const deflistTokenizer: TokenizerExtension = {
  name: 'deflist',
  level: 'block',
  tokenizer(src) {
    const match = DEFLIST.exec(src);
    if (!match?.groups) return undefined;
    const definitions = match.groups.defs
      .split('\n')
      .filter(line => /^ {0,3}:[ \t]/.test(line))
      .map(line => line.replace(/^ {0,3}:[ \t]+/, '').trim());
    return { type: 'deflist', raw: match[0], text: match.groups.term.trim(), definitions };
  },
};

const fieldListTokenizer: TokenizerExtension = {
  name: 'fieldlist',
  level: 'block',
  tokenizer(src) {
    const match = FIELD_LIST.exec(src);
    if (!match) return undefined;
    const fields: Record<string, string> = {};
    for (const line of match[0].split('\n')) {
      const field = FIELD_LINE.exec(line);
      if (field?.groups) {
        fields[field.groups.key] = field.groups.value.trim();
      }
    }
    return { type: 'fieldlist', raw: match[0], fields };
  },
};

const htmlImageTokenizer: TokenizerExtension = {
  name: 'html_image',
  level: 'block',
  tokenizer(src) {
    const match = HTML_IMAGE.exec(src);
    if (!match?.groups) return undefined;
    const attrs: Record<string, string> = {};
    for (const attr of match.groups.attrs.matchAll(/\b([\w-]+)\s*=\s*(?:"([^"]*)"|'([^']*)')/g)) {
      attrs[attr[1].toLowerCase()] = attr[2] ?? attr[3] ?? '';
    }
    return { type: 'image', raw: match[0], href: attrs['src'] ?? '', text: attrs['alt'] ?? '' };
  },
};

const substitutionTokenizer: TokenizerExtension = {
  name: 'substitution',
  level: 'inline',
  start(src) {
    const index = src.indexOf('{{');
    return index < 0 ? undefined : index;
  },
  tokenizer(src) {
    const match = SUBSTITUTION.exec(src);
    if (!match?.groups) return undefined;
    const token: SubstitutionToken = { type: 'substitution', raw: match[0], text: match[0], name: match.groups.name };
    return token;
  },
};

/**
 * Build the marked configuration for a set of markup extensions.
 *
 * Fenced `{name}` directives with backticks or tildes are always recognised;
 * colon fences only with `colon_fence`. Directives and math blocks may start
 * directly under a paragraph line. Link reference definitions are lexed as
 * plain paragraphs so that every source line stays inside some token.
 */
export function markupExtension(enabled: readonly MarkupExtension[]): MarkedExtension {
  const on = new Set(enabled);
  const extensions: TokenizerExtension[] = [frontmatterTokenizer, directiveTokenizer(on.has('colon_fence'))];
  if (on.has('dollarmath')) extensions.push(dollarMathTokenizer);
  if (on.has('amsmath')) extensions.push(amsMathTokenizer);
  if (on.has('deflist')) extensions.push(deflistTokenizer);
  if (on.has('fieldlist')) extensions.push(fieldListTokenizer);
  if (on.has('html_image')) extensions.push(htmlImageTokenizer);
  if (on.has('substitution')) extensions.push(substitutionTokenizer);

  return {
    gfm: enabled.some(name => GFM_EXTENSIONS.has(name)),
    extensions,
    tokenizer: {
      def() {
        return undefined;
      },
    },
  };
}

const REPLACEMENTS: [RegExp, string][] = [
  [/\(c\)/gi, '©'],
  [/\(tm\)/gi, '™'],
  [/\(r\)/gi, '®'],
  [/\+-/g, '±'],
  [/\.{3}/g, '…'],
  [/---/g, '—'],
  [/--/g, '–'],
];

/**
 * Apply the typographic extensions (`replacements`, `smartquotes`) to prose text.
 */
export function typeset(text: string, enabled: readonly MarkupExtension[]): string {
  let result = text;
  if (enabled.includes('replacements')) {
    for (const [pattern, replacement] of REPLACEMENTS) {
      result = result.replace(pattern, replacement);
    }
  }
  if (enabled.includes('smartquotes')) {
    result = result
      .replace(/(^|[\s([{])"/g, '$1“')
      .replace(/"/g, '”')
      .replace(/(^|[\s([{])'/g, '$1‘')
      .replace(/'/g, '’');
  }
  return result;
}

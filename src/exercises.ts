import { MarkerSequencingError } from './errors.js';
import type { Marker, MarkerBoundary, MarkerKind } from './types.js';

export const EXERCISE_START_TEXT = '**Start of exercise**';
export const EXERCISE_END_TEXT = '**End of exercise**';
export const SOLUTION_START_COMMENT = '<!-- start-solution -->';
export const SOLUTION_END_COMMENT = '<!-- end-solution -->';
export const SOLUTION_PLACEHOLDER = '**See page for solution**';

/**
 * Exercise/solution marker, written as a fenced directive:
 *
 *   ```{exercise-start} optional-label
 *   :label: ex-1
 *   ```
 *
 * Group leading: blank lines directly above the marker (kept on rewrite)
 * Group ch: fence character (` : or ~)
 * Group kind / boundary: exercise|solution, start|end
 * Group suffix: rest of the marker line
 * Group attrs: `:key: value` lines after the marker
 * Group close: optional closing fence of the same character
 */
const MARKER_PATTERN = /(?<leading>(?:^[ \t]*\n)*)^[ \t]{0,3}(?<ch>[`:~])\k<ch>{2,}[ \t]*\{(?<kind>exercise|solution)-(?<boundary>start|end)\}(?<suffix>[^\n]*)(?:\n|$)(?<attrs>(?:^[ \t]*:[\w.-]+:[^\n]*(?:\n|$))*)(?<close>^[ \t]*\k<ch>{3,}[ \t]*(?:\n|$))?/gm;

const ATTRIBUTE_LINE = /^[ \t]*:(?<key>[\w.-]+):[ \t]*(?<value>.*)$/;

const SOLUTION_REGION_PATTERN = /<!-- start-solution -->[\s\S]*?<!-- end-solution -->/g;

export type RegionState = 'outside' | 'inside-exercise' | 'inside-solution';

type MarkerTag = `${MarkerKind}-${MarkerBoundary}`;

const TRANSITIONS: Record<RegionState, Partial<Record<MarkerTag, RegionState>>> = {
  'outside': { 'exercise-start': 'inside-exercise', 'solution-start': 'inside-solution' },
  'inside-exercise': { 'exercise-end': 'outside' },
  'inside-solution': { 'solution-end': 'outside' },
};

/**
 * Tracks which exercise or solution region is open while markers are read in
 * document order. A marker with no transition from the current state is an error.
 */
export class MarkerSequencer {
  private current: RegionState = 'outside';

  get state(): RegionState {
    return this.current;
  }

  advance(marker: Pick<Marker, 'kind' | 'boundary' | 'line'>): void {
    const tag: MarkerTag = `${marker.kind}-${marker.boundary}`;
    const next = TRANSITIONS[this.current][tag];
    if (next === undefined) {
      const problem = marker.boundary === 'start'
        ? 'start marker while a region is already open'
        : 'end marker without an open region';
      throw new MarkerSequencingError(`${problem} (line ${marker.line + 1})`, `{${tag}}`, this.current);
    }
    this.current = next;
  }

  /**
   * Check that no region is left open at the end of the document
   */
  finish(): void {
    if (this.current !== 'outside') {
      throw new MarkerSequencingError('region not closed at end of document', 'end of document', this.current);
    }
  }
}

function isMarkerKind(value: string): value is MarkerKind {
  return value === 'exercise' || value === 'solution';
}

function isMarkerBoundary(value: string): value is MarkerBoundary {
  return value === 'start' || value === 'end';
}

function parseAttributes(block: string): Record<string, string> {
  const attributes: Record<string, string> = {};
  for (const line of block.split('\n')) {
    const match = ATTRIBUTE_LINE.exec(line);
    if (match?.groups) {
      attributes[match.groups.key] = match.groups.value.trim();
    }
  }
  return attributes;
}

interface MarkerMatch {
  marker: Marker;
  /** Offset of the match in the text (including leading blank lines) */
  index: number;
  /** Full matched text */
  matched: string;
  leading: string;
}

function* matchMarkers(text: string): Generator<MarkerMatch> {
  const pattern = new RegExp(MARKER_PATTERN.source, MARKER_PATTERN.flags);
  let line = 0;
  let counted = 0;

  let match: RegExpExecArray | null;
  while ((match = pattern.exec(text)) !== null) {
    const groups = match.groups;
    if (!groups || !isMarkerKind(groups.kind) || !isMarkerBoundary(groups.boundary)) continue;

    const leading = groups.leading ?? '';
    const markerOffset = match.index + leading.length;
    for (let i = counted; i < markerOffset; i++) {
      if (text[i] === '\n') line++;
    }
    counted = markerOffset;

    yield {
      marker: {
        kind: groups.kind,
        boundary: groups.boundary,
        suffix: groups.suffix.trim(),
        attributes: parseAttributes(groups.attrs ?? ''),
        line,
      },
      index: match.index,
      matched: match[0],
      leading,
    };
  }
}

function replacementFor(marker: Marker): string {
  if (marker.kind === 'exercise') {
    return marker.boundary === 'start' ? EXERCISE_START_TEXT : EXERCISE_END_TEXT;
  }
  return marker.boundary === 'start' ? SOLUTION_START_COMMENT : SOLUTION_END_COMMENT;
}

/**
 * List the exercise/solution markers of a document in order, without
 * checking their sequencing
 */
export function scanMarkers(text: string): Marker[] {
  return Array.from(matchMarkers(text), found => found.marker);
}

/**
 * Replace exercise markers with plain bracketing text and collapse each
 * solution region to a single placeholder line.
 */
export function rewriteExerciseSolution(text: string): string {
  const sequencer = new MarkerSequencer();
  let output = '';
  let last = 0;

  for (const { marker, index, matched, leading } of matchMarkers(text)) {
    sequencer.advance(marker);
    const newline = matched.endsWith('\n') ? '\n' : '';
    output += text.slice(last, index) + leading + replacementFor(marker) + newline;
    last = index + matched.length;
  }
  output += text.slice(last);
  sequencer.finish();

  return collapseSolutions(output);
}

/**
 * Replace every marked solution region, delimiters included, with the placeholder
 */
export function collapseSolutions(text: string): string {
  return text.replace(SOLUTION_REGION_PATTERN, SOLUTION_PLACEHOLDER);
}

import * as test from 'node:test';
import * as assert from 'node:assert';
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as url from 'node:url';
import {
  MarkerSequencer,
  SOLUTION_PLACEHOLDER,
  collapseSolutions,
  rewriteExerciseSolution,
  scanMarkers,
} from '../exercises.js';
import { MarkerSequencingError } from '../errors.js';

const { describe, it } = test;
const __dirname = path.dirname(url.fileURLToPath(import.meta.url));

function countLines(text: string, line: string): number {
  return text.split('\n').filter(l => l === line).length;
}

describe('scanMarkers', () => {

  it('should list markers in document order', () => {
    const text = fs.readFileSync(path.join(__dirname, 'fixtures', 'eg.Rmd'), 'utf-8');
    const markers = scanMarkers(text);

    assert.deepStrictEqual(
      markers.map(m => [m.kind, m.boundary, m.line]),
      [
        ['exercise', 'start', 27],
        ['exercise', 'end', 37],
        ['solution', 'start', 40],
        ['solution', 'end', 50],
      ]
    );
    assert.deepStrictEqual(markers[0].attributes, { label: 'count-words' });
    assert.strictEqual(markers[2].suffix, 'count-words');
    assert.deepStrictEqual(markers[2].attributes, { class: 'dropdown' });
  });

  it('should accept colon and tilde fences', () => {
    const markers = scanMarkers(':::{exercise-start}\n:label: ex1\n:::\nBody\n~~~{exercise-end}\n~~~\n');

    assert.deepStrictEqual(markers.map(m => [m.boundary, m.line]), [['start', 0], ['end', 4]]);
    assert.deepStrictEqual(markers[0].attributes, { label: 'ex1' });
  });

  it('should ignore other directives', () => {
    assert.deepStrictEqual(scanMarkers('```{python}\nx = 1\n```\n\n```{exercise}\n```\n'), []);
  });
});

describe('MarkerSequencer', () => {

  it('should move between regions', () => {
    const sequencer = new MarkerSequencer();
    assert.strictEqual(sequencer.state, 'outside');

    sequencer.advance({ kind: 'exercise', boundary: 'start', line: 0 });
    assert.strictEqual(sequencer.state, 'inside-exercise');
    sequencer.advance({ kind: 'exercise', boundary: 'end', line: 4 });
    assert.strictEqual(sequencer.state, 'outside');
    sequencer.advance({ kind: 'solution', boundary: 'start', line: 6 });
    assert.strictEqual(sequencer.state, 'inside-solution');
    sequencer.advance({ kind: 'solution', boundary: 'end', line: 9 });
    assert.strictEqual(sequencer.state, 'outside');
    sequencer.finish();
  });

  it('should reject an end of the wrong kind', () => {
    const sequencer = new MarkerSequencer();
    sequencer.advance({ kind: 'solution', boundary: 'start', line: 0 });

    assert.throws(
      () => sequencer.advance({ kind: 'exercise', boundary: 'end', line: 2 }),
      (err: unknown) => {
        assert.ok(err instanceof MarkerSequencingError);
        assert.strictEqual(err.marker, '{exercise-end}');
        assert.strictEqual(err.state, 'inside-solution');
        return true;
      }
    );
  });
});

describe('rewriteExerciseSolution', () => {

  it('should bracket the exercise and collapse the solution that follows it', () => {
    const input = [
      'Intro.',
      '',
      '```{exercise-start}',
      '```',
      '',
      'Write a loop.',
      '',
      '```{exercise-end}',
      '```',
      '<!-- start-solution -->',
      'for i in range(3): print(i)',
      '<!-- end-solution -->',
      '',
      'Done.',
      '',
    ].join('\n');

    assert.strictEqual(
      rewriteExerciseSolution(input),
      'Intro.\n\n**Start of exercise**\n\nWrite a loop.\n\n**End of exercise**\n**See page for solution**\n\nDone.\n'
    );
  });

  it('should rewrite a notebook page with exercise and solution markers', () => {
    const text = fs.readFileSync(path.join(__dirname, 'fixtures', 'eg.Rmd'), 'utf-8');
    const output = rewriteExerciseSolution(text);

    assert.strictEqual(countLines(output, '**Start of exercise**'), 1);
    assert.strictEqual(countLines(output, '**End of exercise**'), 1);
    assert.strictEqual(countLines(output, SOLUTION_PLACEHOLDER), 1);
    assert.ok(output.indexOf('**Start of exercise**') < output.indexOf('Count the words'));
    assert.ok(output.indexOf('Count the words') < output.indexOf('**End of exercise**'));
    assert.ok(output.indexOf('**End of exercise**') < output.indexOf(SOLUTION_PLACEHOLDER));
    assert.strictEqual(output.includes('len(words)'), false);
    assert.strictEqual(output.includes(':class: dropdown'), false);
    assert.strictEqual(/\{(exercise|solution)-(start|end)\}/.test(output), false);
  });

  it('should consume attribute lines and keep marker suffixes out of the output', () => {
    const output = rewriteExerciseSolution(':::{exercise-start}\n:label: ex1\n:::\nBody\n~~~{exercise-end}\n~~~\n');

    assert.strictEqual(output, '**Start of exercise**\nBody\n**End of exercise**\n');
  });

  it('should accept markers without a closing fence', () => {
    const output = rewriteExerciseSolution('```{exercise-start} ex-2\nText\n```{exercise-end}\n');

    assert.strictEqual(output, '**Start of exercise**\nText\n**End of exercise**\n');
  });

  it('should raise on an end marker without a start', () => {
    assert.throws(
      () => rewriteExerciseSolution('Text\n\n```{exercise-end}\n```\n'),
      (err: unknown) => {
        assert.ok(err instanceof MarkerSequencingError);
        assert.strictEqual(
          err.message,
          'end marker without an open region (line 3): marker {exercise-end} in state outside'
        );
        return true;
      }
    );
  });

  it('should raise on a start marker inside an open region', () => {
    assert.throws(
      () => rewriteExerciseSolution('```{exercise-start}\n```\n\n```{solution-start}\n```\n'),
      (err: unknown) => {
        assert.ok(err instanceof MarkerSequencingError);
        assert.strictEqual(
          err.message,
          'start marker while a region is already open (line 4): marker {solution-start} in state inside-exercise'
        );
        return true;
      }
    );
  });

  it('should raise when a region is still open at the end', () => {
    assert.throws(
      () => rewriteExerciseSolution('```{exercise-start}\n```\nText\n'),
      (err: unknown) => {
        assert.ok(err instanceof MarkerSequencingError);
        assert.strictEqual(err.message, 'region not closed at end of document: marker end of document in state inside-exercise');
        return true;
      }
    );
  });

  it('should return text without markers unchanged', () => {
    const text = '# Title\n\n```{python}\nx = 1\n```\n';

    assert.strictEqual(rewriteExerciseSolution(text), text);
  });
});

describe('collapseSolutions', () => {

  it('should replace each solution region with the placeholder', () => {
    const text = 'a\n<!-- start-solution -->\nx\n<!-- end-solution -->\nb\n<!-- start-solution -->y<!-- end-solution -->\n';

    assert.strictEqual(collapseSolutions(text), `a\n${SOLUTION_PLACEHOLDER}\nb\n${SOLUTION_PLACEHOLDER}\n`);
  });
});

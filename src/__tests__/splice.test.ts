import { describe, it, expect } from 'vitest';
import { HTML_MARKERS, commentMarkers, splice } from '../splice.js';

const START = HTML_MARKERS.start;
const END = HTML_MARKERS.end;

describe('splice', () => {
  it('replaces the lines between the markers', () => {
    const document = ['<html>', START, 'old 1', 'old 2', END, '</html>'].join('\n');

    expect(splice(document, 'new')).toEqual({
      text: ['<html>', START, 'new', END, '</html>'].join('\n'),
      status: 'replaced',
    });
  });

  it('matches indented markers', () => {
    const document = ['<body>', `  ${START}`, '  old', `  ${END}`, '</body>'].join('\n');

    expect(splice(document, 'new').text).toBe(['<body>', `  ${START}`, 'new', `  ${END}`, '</body>'].join('\n'));
  });

  it('leaves a document without a start marker unchanged', () => {
    const document = 'no markers here\n';
    expect(splice(document, 'new')).toEqual({ text: document, status: 'missing' });
  });

  it('keeps every original line when the end marker is missing', () => {
    const document = ['intro', START, 'kept 1', 'kept 2'].join('\n');

    expect(splice(document, 'new')).toEqual({
      text: ['intro', START, 'new', 'kept 1', 'kept 2'].join('\n'),
      status: 'unterminated',
    });
  });

  it('only replaces the first region', () => {
    const document = [START, 'a', END, START, 'b', END].join('\n');
    expect(splice(document, 'new').text).toBe([START, 'new', END, START, 'b', END].join('\n'));
  });

  it('computes the block from the start marker line', () => {
    const markers = commentMarkers();
    const document = ['/**', ` * ${START}`, ' * old', ` * ${END}`, ' */', 'export {};'].join('\n');

    const result = splice(document, (startLine) => `${' '.repeat(startLine.indexOf('*'))}* new`, markers);
    expect(result.text).toBe(['/**', ` * ${START}`, ' * new', ` * ${END}`, ' */', 'export {};'].join('\n'));
    expect(result.status).toBe('replaced');
  });
});

describe('commentMarkers', () => {
  it('prefixes both markers with the comment star', () => {
    expect(commentMarkers({ start: 'BEGIN', end: 'END' })).toEqual({ start: '* BEGIN', end: '* END' });
  });
});

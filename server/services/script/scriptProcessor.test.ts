import { describe, it, expect } from 'vitest';
import {
  EmptyScriptError,
  cleanScript,
  processScript,
  processScriptByNewlines,
  segmentScript,
  splitIntoSegments,
  splitIntoSentences,
} from './scriptProcessor.js';

const SCRIPT =
  'One two three four five. Six seven eight nine. Ten eleven twelve thirteen fourteen fifteen sixteen. End.';

describe('scriptProcessor', () => {
  it('collapses whitespace', () => {
    expect(cleanScript('  a\n\n b\t c ')).toBe('a b c');
  });

  it('keeps punctuation and trailing text when splitting sentences', () => {
    expect(splitIntoSentences('Hi there! How are you?? fine')).toEqual(['Hi there!', 'How are you??', 'fine']);
  });

  it('closes a segment once it reaches most of the target', () => {
    // 4 seconds is 10 words; segments close at 8
    expect(splitIntoSegments(SCRIPT, 4)).toEqual([
      'One two three four five. Six seven eight nine.',
      'Ten eleven twelve thirteen fourteen fifteen sixteen. End.',
    ]);
  });

  it('starts a new segment rather than overshooting', () => {
    expect(splitIntoSegments('a b c d e f. g h i j k l m.', 4)).toEqual(['a b c d e f.', 'g h i j k l m.']);
  });

  it('estimates timings from word counts', () => {
    const [first, second] = processScript(SCRIPT, 4);
    expect(first).toMatchObject({ index: 0, wordCount: 9, startTime: 0 });
    expect(first?.estimatedDuration).toBeCloseTo(3.6);
    expect(second).toMatchObject({ index: 1, wordCount: 8 });
    expect(second?.startTime).toBeCloseTo(3.6);
    expect(second?.endTime).toBeCloseTo(6.8);
  });

  it('makes one segment per non-empty line', () => {
    const segments = processScriptByNewlines('First line\r\n\r\nSecond line\n  Third  ');
    expect(segments.map((s) => s.text)).toEqual(['First line', 'Second line', 'Third']);
    expect(segments.map((s) => s.index)).toEqual([0, 1, 2]);
  });

  it('routes by segmentation mode', () => {
    expect(segmentScript('A.\nB.', 'newline')).toHaveLength(2);
    expect(segmentScript('A.\nB.', 'duration')).toHaveLength(1);
  });

  it('refuses an empty script', () => {
    expect(() => processScript('   ')).toThrow(EmptyScriptError);
    expect(() => processScriptByNewlines('\n\n')).toThrow('Script cannot be empty');
  });
});

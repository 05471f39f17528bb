/**
 * Script Processor
 *
 * Splits narration text into segments sized for a target spoken duration,
 * or one segment per line, with estimated timings.
 */

export const WORDS_PER_MINUTE = 150;
export const WORDS_PER_SECOND = WORDS_PER_MINUTE / 60;
export const DEFAULT_SEGMENT_DURATION = 30;

export type SegmentationMode = 'duration' | 'newline';

export interface TimedSegment {
  /** 0-based sequence index */
  index: number;
  text: string;
  wordCount: number;
  startTime: number;
  endTime: number;
  estimatedDuration: number;
}

export class EmptyScriptError extends Error {
  constructor() {
    super('Script cannot be empty');
    this.name = 'EmptyScriptError';
  }
}

function countWords(text: string): number {
  const trimmed = text.trim();
  return trimmed ? trimmed.split(/\s+/).length : 0;
}

export function cleanScript(script: string): string {
  return script.replace(/\s+/g, ' ').trim();
}

/**
 * Sentences with their terminal punctuation kept. Trailing text without
 * punctuation becomes its own sentence.
 */
export function splitIntoSentences(text: string): string[] {
  const parts = text.split(/([.!?]+)/);
  const sentences: string[] = [];

  for (let i = 0; i + 1 < parts.length; i += 2) {
    const sentence = `${(parts[i] ?? '').trim()}${parts[i + 1] ?? ''}`;
    if (sentence) sentences.push(sentence);
  }
  if (parts.length % 2 === 1) {
    const tail = (parts[parts.length - 1] ?? '').trim();
    if (tail) sentences.push(tail);
  }
  return sentences;
}

/**
 * Group sentences until roughly `targetDuration` seconds of speech.
 * A group closes once it reaches 80% of the target word count; a sentence
 * that would push it past 120% starts the next group instead.
 */
export function splitIntoSegments(script: string, targetDuration: number): string[] {
  const targetWords = Math.floor(targetDuration * WORDS_PER_SECOND);
  const segments: string[] = [];
  let current: string[] = [];
  let currentWords = 0;

  for (const sentence of splitIntoSentences(script)) {
    const words = countWords(sentence);

    if (currentWords + words > targetWords * 1.2 && current.length > 0) {
      segments.push(current.join(' '));
      current = [sentence];
      currentWords = words;
      continue;
    }

    current.push(sentence);
    currentWords += words;
    if (currentWords >= targetWords * 0.8) {
      segments.push(current.join(' '));
      current = [];
      currentWords = 0;
    }
  }

  if (current.length > 0) {
    segments.push(current.join(' '));
  }
  return segments;
}

export function calculateTimings(texts: string[]): TimedSegment[] {
  let cursor = 0;
  return texts.map((text, index) => {
    const wordCount = countWords(text);
    const estimatedDuration = wordCount / WORDS_PER_SECOND;
    const segment: TimedSegment = {
      index,
      text,
      wordCount,
      startTime: cursor,
      endTime: cursor + estimatedDuration,
      estimatedDuration,
    };
    cursor += estimatedDuration;
    return segment;
  });
}

export function processScript(script: string, targetDuration: number = DEFAULT_SEGMENT_DURATION): TimedSegment[] {
  if (!script.trim()) throw new EmptyScriptError();
  return calculateTimings(splitIntoSegments(cleanScript(script), targetDuration));
}

export function processScriptByNewlines(script: string): TimedSegment[] {
  if (!script.trim()) throw new EmptyScriptError();
  const lines = script
    .replace(/\r\n?/g, '\n')
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
  return calculateTimings(lines);
}

export function segmentScript(
  script: string,
  mode: SegmentationMode,
  targetDuration: number = DEFAULT_SEGMENT_DURATION
): TimedSegment[] {
  return mode === 'newline' ? processScriptByNewlines(script) : processScript(script, targetDuration);
}

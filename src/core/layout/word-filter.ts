import type { OCRDetection, RecognizedWord, Word } from '../../types/ocr.js';

export const DEFAULT_CONFIDENCE_THRESHOLD = 40;

export type WordFilterOptions = {
  confidenceThreshold?: number;
};

function toNumber(value: unknown): number | null {
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value === 'string' && value.trim().length > 0) {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

function toText(value: unknown): string | null {
  if (typeof value === 'string') return value;
  if (typeof value === 'number') return String(value);
  return null;
}

/**
 * Classifies one engine row. Returns null for rows that cannot be read
 * (missing text or a non-numeric box/confidence field).
 */
export function toWord(detection: OCRDetection): Word | null {
  const left = toNumber(detection.left);
  const top = toNumber(detection.top);
  const width = toNumber(detection.width);
  const height = toNumber(detection.height);
  const confidence = toNumber(detection.confidence);
  if (left === null || top === null || width === null || height === null || confidence === null) {
    return null;
  }

  const box = {
    left: Math.trunc(left),
    top: Math.trunc(top),
    width: Math.trunc(width),
    height: Math.trunc(height)
  };

  if (confidence < 0) {
    return { kind: 'structural', ...box };
  }

  const text = toText(detection.text);
  if (text === null) return null;

  return { kind: 'word', text: text.trim(), confidence, ...box };
}

export function isKeptWord(word: Word, confidenceThreshold: number): word is RecognizedWord {
  if (word.kind === 'structural') return false;
  if (word.text.length === 0) return false;
  return word.confidence >= confidenceThreshold;
}

export function filterWords(
  detections: readonly OCRDetection[],
  options: WordFilterOptions = {}
): RecognizedWord[] {
  const threshold = options.confidenceThreshold ?? DEFAULT_CONFIDENCE_THRESHOLD;
  const kept: RecognizedWord[] = [];

  for (const detection of detections) {
    if (!detection || typeof detection !== 'object') continue;
    const word = toWord(detection);
    if (word && isKeptWord(word, threshold)) {
      kept.push(word);
    }
  }

  return kept;
}

// Video tokenization rates used to size analysis segments
export const TOKENS_PER_FRAME = 258;
export const AUDIO_TOKENS_PER_SECOND = 32;
export const PROMPT_OVERHEAD_TOKENS = 5000;
export const SAFETY_MARGIN_PERCENT = 10;

export interface SegmentSizing {
  contextWindowTokens: number;
  maxOutputTokens: number;
  framesPerSecond?: number;
}

export interface PlannedSegment {
  index: number;
  startSeconds: number;
  endSeconds: number;
}

export function tokensPerSecond(framesPerSecond = 1): number {
  return TOKENS_PER_FRAME * framesPerSecond + AUDIO_TOKENS_PER_SECOND;
}

// Longest segment whose tokens still fit the analysis model's input budget
export function computeSegmentDurationSeconds(sizing: SegmentSizing): number {
  const safetyMarginTokens = Math.floor(
    sizing.contextWindowTokens * (SAFETY_MARGIN_PERCENT / 100),
  );
  const availableInputTokens =
    sizing.contextWindowTokens -
    sizing.maxOutputTokens -
    PROMPT_OVERHEAD_TOKENS -
    safetyMarginTokens;
  const seconds = Math.floor(availableInputTokens / tokensPerSecond(sizing.framesPerSecond));
  return Math.max(1, seconds);
}

// Splits [0, min(duration, maxDuration)) into consecutive segments.
// A zero-length video still yields one (empty) segment so analysis runs once.
export function planSegments(
  durationSeconds: number,
  segmentDurationSeconds: number,
  maxDurationSeconds?: number | null,
): PlannedSegment[] {
  const step = Math.max(1, Math.floor(segmentDurationSeconds));
  const limit =
    maxDurationSeconds !== undefined && maxDurationSeconds !== null
      ? Math.min(durationSeconds, maxDurationSeconds)
      : durationSeconds;
  const total = Math.max(0, limit);
  if (total === 0) {
    return [{ index: 0, startSeconds: 0, endSeconds: 0 }];
  }

  const segments: PlannedSegment[] = [];
  for (let start = 0, index = 0; start < total; start += step, index += 1) {
    segments.push({ index, startSeconds: start, endSeconds: Math.min(total, start + step) });
  }
  return segments;
}

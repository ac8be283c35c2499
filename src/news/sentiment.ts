import type { SentimentLabel } from "./types.js";

const POSITIVE_WORDS = [
  "surge",
  "rally",
  "rallies",
  "record",
  "bull",
  "breakout",
  "gain",
  "rise",
  "optimism",
  "approval",
  "upgrade",
];
const NEGATIVE_WORDS = [
  "drop",
  "crash",
  "bear",
  "selloff",
  "decline",
  "loss",
  "downgrade",
  "lawsuit",
  "ban",
  "hack",
];

export const SENTIMENT_NEUTRAL_BAND = 0.15;

export type SentimentScore = {
  score: number;
  label: SentimentLabel;
  confidence: number;
};

function countWords(haystack: string, words: string[]): number {
  return words.reduce(
    (acc, word) => acc + (new RegExp(`\\b${word}(?:s|es|d|ed|ing|ish)?\\b`).test(haystack) ? 1 : 0),
    0,
  );
}

export function labelForScore(score: number): SentimentLabel {
  if (score > SENTIMENT_NEUTRAL_BAND) {
    return "positive";
  }
  if (score < -SENTIMENT_NEUTRAL_BAND) {
    return "negative";
  }
  return "neutral";
}

/** Keyword heuristic in [-1, 1]; stands in for a model-backed scorer. */
export function scoreSentiment(text: string): SentimentScore {
  const haystack = text.toLowerCase();
  const pos = countWords(haystack, POSITIVE_WORDS);
  const neg = countWords(haystack, NEGATIVE_WORDS);
  const total = pos + neg;
  if (total === 0) {
    return { score: 0, label: "neutral", confidence: 0.3 };
  }
  const score = Number(((pos - neg) / total).toFixed(3));
  const confidence = Math.min(1, 0.4 + Math.abs(score) * 0.6);
  return { score, label: labelForScore(score), confidence: Number(confidence.toFixed(3)) };
}

import { describe, expect, it } from "vitest";
import { labelForScore, scoreSentiment } from "./sentiment.js";

describe("scoreSentiment", () => {
  it("scores positive and negative wording", () => {
    expect(scoreSentiment("Bitcoin rally hits record high")).toEqual({
      score: 1,
      label: "positive",
      confidence: 1,
    });
    expect(scoreSentiment("Exchange hack triggers crash").label).toBe("negative");
  });

  it("balances mixed wording to neutral", () => {
    expect(scoreSentiment("Rally fades into decline")).toEqual({
      score: 0,
      label: "neutral",
      confidence: 0.4,
    });
  });

  it("matches whole words with simple suffixes", () => {
    expect(scoreSentiment("Bank shares rally").label).toBe("positive");
    expect(scoreSentiment("Against expectations")).toEqual({
      score: 0,
      label: "neutral",
      confidence: 0.3,
    });
    expect(scoreSentiment("Shares crashed").score).toBe(-1);
  });
});

describe("labelForScore", () => {
  it("uses a neutral band around zero", () => {
    expect([-0.5, -0.15, 0, 0.15, 0.2].map(labelForScore)).toEqual([
      "negative",
      "neutral",
      "neutral",
      "neutral",
      "positive",
    ]);
  });
});

import { splitSentences, truncateAtSentence } from "../../../src/pipeline/sentence-splitter";

describe("splitSentences", () => {
  it("splits on terminal punctuation and keeps trailing text", () => {
    expect(splitSentences('He said "yes." Then left! Why? ok')).toEqual(['He said "yes."', "Then left!", "Why?", "ok"]);
  });

  it("does not split inside numbers", () => {
    expect(splitSentences("Pi is 3.14 roughly. Yes.")).toEqual(["Pi is 3.14 roughly.", "Yes."]);
  });

  it("returns nothing for blank input", () => {
    expect(splitSentences("   ")).toEqual([]);
  });
});

describe("truncateAtSentence", () => {
  it("keeps text that fits", () => {
    expect(truncateAtSentence("  Short. ", 50)).toBe("Short.");
  });

  it("cuts after the last whole sentence that fits", () => {
    expect(truncateAtSentence("First sentence here. Second sentence is longer.", 30)).toBe("First sentence here.");
  });

  it("falls back to a word cut with an ellipsis", () => {
    expect(truncateAtSentence("aaaa bbbb cccc dddd", 12)).toBe("aaaa bbbb...");
  });
});

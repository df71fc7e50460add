import { WordListAccumulator, splitWords } from "./word-list";

describe("splitWords", () => {
  it("splits on any whitespace and drops empty tokens", () => {
    expect(splitWords("  alpha\tbeta\n\ngamma  ")).toEqual(["alpha", "beta", "gamma"]);
  });

  it("keeps case and punctuation as-is", () => {
    expect(splitWords("Hello, World! hello")).toEqual(["Hello,", "World!", "hello"]);
  });

  it("returns nothing for blank text", () => {
    expect(splitWords("   ")).toEqual([]);
  });
});

describe("WordListAccumulator", () => {
  it("flattens items in arrival order without deduplicating", () => {
    const acc = new WordListAccumulator(5);
    acc.add("alpha beta");
    acc.add("gamma");
    acc.add("alpha");

    expect(acc.result()).toEqual({ words: ["alpha", "beta", "gamma", "alpha"], items: 3, partial: false });
  });

  it("counts an item with no words", () => {
    const acc = new WordListAccumulator(1);
    acc.add("");

    expect(acc.items).toBe(1);
    expect(acc.full).toBe(true);
    expect(acc.result(true)).toEqual({ words: [], items: 1, partial: true });
  });
});

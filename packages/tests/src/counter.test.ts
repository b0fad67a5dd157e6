import { describe, it, expect } from "vitest";
import { FrequencyCounter, isSeparator } from "@lexicon/pipeline";

describe("FrequencyCounter", () => {
  it("counts tokens and skips whitespace pieces", () => {
    const counter = new FrequencyCounter();
    counter.update(["a", " ", "b", "", "\t", "a"]);

    expect(counter.get("a")).toBe(2);
    expect(counter.get("b")).toBe(1);
    expect(counter.has(" ")).toBe(false);
    expect(counter.has("")).toBe(false);
    expect(counter.size).toBe(2);
    expect(counter.total).toBe(3);
  });

  it("orders by descending count, ties in first-seen order", () => {
    const counter = new FrequencyCounter();
    counter.update(["x", "y", "z", "y"]);

    expect(counter.mostCommon()).toEqual([["y", 2], ["x", 1], ["z", 1]]);
  });

  it("gives the same order on repeated enumeration", () => {
    const counter = new FrequencyCounter();
    counter.update(["q", "w", "e", "r", "t", "w", "t"]);

    const first = counter.mostCommon();
    const second = counter.mostCommon();
    expect(second).toEqual(first);
    expect(first.map(([w]) => w)).toEqual(["w", "t", "q", "e", "r"]);
  });

  it("limits to the first n entries", () => {
    const counter = new FrequencyCounter();
    counter.update(["a", "b", "b"]);
    expect(counter.mostCommon(1)).toEqual([["b", 2]]);
  });

  it("delete removes the entry entirely", () => {
    const counter = new FrequencyCounter();
    counter.update(["a", "b", "b"]);

    expect(counter.delete("b")).toBe(true);
    expect(counter.has("b")).toBe(false);
    expect(counter.get("b")).toBe(0);
    expect(counter.size).toBe(1);
    expect(counter.mostCommon()).toEqual([["a", 1]]);
    expect(counter.delete("missing")).toBe(false);
  });

  it("isSeparator matches only whitespace and empty strings", () => {
    expect(isSeparator("")).toBe(true);
    expect(isSeparator(" \n")).toBe(true);
    expect(isSeparator("EE. UU.")).toBe(false);
    expect(isSeparator(".")).toBe(false);
  });
});

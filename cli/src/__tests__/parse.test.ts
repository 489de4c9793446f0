import { InvalidArgumentError } from "commander";

import { parseDeclinedRescanPolicy, parsePositiveInt } from "../util/parse";

describe("parsePositiveInt", () => {
  it("accepts positive integers, ignoring surrounding spaces", () => {
    expect(parsePositiveInt("4")).toBe(4);
    expect(parsePositiveInt(" 12 ")).toBe(12);
  });

  it.each(["0", "-1", "2.5", "abc", ""])("rejects %p", (value) => {
    expect(() => parsePositiveInt(value)).toThrow(InvalidArgumentError);
  });
});

describe("parseDeclinedRescanPolicy", () => {
  it("accepts abort and skip in any case", () => {
    expect(parseDeclinedRescanPolicy("abort")).toBe("abort");
    expect(parseDeclinedRescanPolicy("SKIP")).toBe("skip");
  });

  it("rejects other values", () => {
    expect(() => parseDeclinedRescanPolicy("ask")).toThrow("Expected 'abort' or 'skip', got 'ask'");
  });
});

import { beforeEach, describe, expect, it, vi } from "vitest";
import { KeywordCommandClassifier, DEFAULT_COMMAND_KEYWORDS } from "./command-classifier.js";

describe("KeywordCommandClassifier", () => {
  beforeEach(() => {
    vi.spyOn(console, "debug").mockImplementation(() => undefined);
  });

  it("flags utterances containing a trigger word", () => {
    const classifier = new KeywordCommandClassifier();
    expect(classifier.classify("Please run the backup")).toBe(true);
    expect(classifier.classify("open the calculator")).toBe(true);
    expect(classifier.classify("SHUTDOWN now")).toBe(true);
    expect(classifier.classify("Launch Firefox")).toBe(true);
  });

  it("passes conversation through", () => {
    const classifier = new KeywordCommandClassifier();
    expect(classifier.classify("How are you today")).toBe(false);
    expect(classifier.classify("")).toBe(false);
  });

  it("matches inside longer words", () => {
    const classifier = new KeywordCommandClassifier();
    expect(classifier.match("I was running late")).toEqual({ matched: true, keyword: "run" });
    expect(classifier.match("the door is reopened")).toEqual({ matched: true, keyword: "open" });
  });

  it("reports the first keyword in list order", () => {
    const classifier = new KeywordCommandClassifier();
    expect(classifier.match("run it then open it")).toEqual({ matched: true, keyword: "open" });
  });

  it("uses the fixed default keyword list", () => {
    expect(DEFAULT_COMMAND_KEYWORDS).toEqual(["open", "launch", "execute", "run", "shutdown"]);
  });

  it("accepts a replacement keyword list", () => {
    const classifier = new KeywordCommandClassifier(["Start", " "]);
    expect(classifier.getKeywords()).toEqual(["start"]);
    expect(classifier.classify("start the music")).toBe(true);
    expect(classifier.classify("open the door")).toBe(false);
  });
});

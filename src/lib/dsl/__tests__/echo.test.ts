import { EchoExecutor } from "../echo";
import { positionalSimilarity } from "../similarity";

describe("EchoExecutor", () => {
  const executor = new EchoExecutor();

  it("should print the trimmed program", () => {
    expect(executor.execute(" hi! ")).toEqual({ success: true, output: "hi!", error: null });
  });

  it("should reject a blank program", () => {
    expect(executor.execute("   ")).toEqual({ success: false, output: null, error: "empty program" });
  });
});

describe("positionalSimilarity", () => {
  it("should score identical strings as 1", () => {
    expect(positionalSimilarity("42", "42")).toBe(1);
    expect(positionalSimilarity(" hi ", "hi")).toBe(1);
  });

  it("should count matching positions against the longer string", () => {
    expect(positionalSimilarity("4", "42")).toBe(0.5);
    expect(positionalSimilarity("h!", "hi")).toBe(0.5);
    expect(positionalSimilarity("24", "42")).toBe(0);
    expect(positionalSimilarity("abcd", "ab")).toBe(0.5);
  });

  it("should score an empty expectation as 0", () => {
    expect(positionalSimilarity("x", "")).toBe(0);
    expect(positionalSimilarity("", "")).toBe(0);
  });
});

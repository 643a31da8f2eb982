import { extractCandidates } from "../src/extractor";
import { buildJudgmentRequest, JUDGMENT_SYSTEM_PROMPT } from "../src/judgment-prompt";
import { pairCandidates } from "../src/pairing";
import { normalizeIndentation, numberLines, sliceRows } from "../src/source-text";
import { makeUnit } from "./helpers";

describe("buildJudgmentRequest", () => {
  const unit = makeUnit(
    "render",
    ["def render(page):", "    body = None", "    if page:", "        body = page.body", "    return body.html"],
    8,
    "views.py",
  );
  const [pair] = pairCandidates(extractCandidates(unit));
  const request = buildJudgmentRequest(pair, unit);

  it("should use the judgment system prompt", () => {
    expect(request.system).toBe(JUDGMENT_SYSTEM_PROMPT);
  });

  it("should describe the function with absolute line numbers", () => {
    const lines = request.prompt.split("\n");

    expect(lines.slice(0, 10)).toEqual([
      "File: views.py",
      "Function: render (lines 8-12)",
      "",
      "```python",
      " 8 | def render(page):",
      " 9 |     body = None",
      "10 |     if page:",
      "11 |         body = page.body",
      "12 |     return body.html",
      "```",
    ]);
  });

  it("should name both candidate sites", () => {
    expect(request.prompt).toContain("  - source: line 9 binds `body` to None: `body = None`");
    expect(request.prompt).toContain("  - sink: line 12 dereferences `body`: `return body.html`");
    expect(request.prompt).toContain("make the None state of `body` unreachable at line 12?");
  });
});

describe("source text helpers", () => {
  it("should remove common indentation and keep blank rows", () => {
    expect(normalizeIndentation("    def f():\n\n        return 1\n")).toBe("def f():\n\n    return 1");
  });

  it("should handle empty text", () => {
    expect(normalizeIndentation("   \n  ")).toBe("");
  });

  it("should number lines from a starting line", () => {
    expect(numberLines("a\nb", 99)).toBe(" 99 | a\n100 | b");
  });

  it("should slice an inclusive row range", () => {
    expect(sliceRows("r0\nr1\nr2\nr3", 1, 2)).toBe("r1\nr2");
  });
});

import { SchemaError } from "../src/errors";
import { extractJsonObject, parseJudgmentResponse } from "../src/response-parser";

describe("extractJsonObject", () => {
  it("should return a bare object unchanged", () => {
    expect(extractJsonObject('{"vulnerable": false}')).toBe('{"vulnerable": false}');
  });

  it("should strip Markdown fences", () => {
    expect(extractJsonObject('```json\n{"vulnerable": false}\n```')).toBe('{"vulnerable": false}');
  });

  it("should drop prose around the object", () => {
    expect(extractJsonObject('Here is my answer: {"vulnerable": false} Hope this helps.')).toBe(
      '{"vulnerable": false}',
    );
  });

  it("should throw SchemaError when no object is present", () => {
    expect(() => extractJsonObject("The code looks safe.")).toThrow(
      new SchemaError("Response contains no JSON object", "The code looks safe."),
    );
  });
});

describe("parseJudgmentResponse", () => {
  it("should parse a vulnerable judgment and normalize its levels", () => {
    const result = parseJudgmentResponse(
      JSON.stringify({
        vulnerable: true,
        confidence: "High",
        severity: "CRITICAL",
        condition: "when flag is False",
        explanation: "user is only reassigned inside the if block",
      }),
    );

    expect(result).toEqual({
      vulnerable: true,
      confidence: "high",
      severity: "critical",
      condition: "when flag is False",
      explanation: "user is only reassigned inside the if block",
    });
  });

  it("should accept a numeric confidence and a missing severity", () => {
    const result = parseJudgmentResponse(
      '```json\n{"vulnerable": true, "confidence": 0.85, "condition": "always", "explanation": ""}\n```',
    );

    expect(result.confidence).toBe(0.85);
    expect(result.severity).toBeNull();
  });

  it("should default the optional fields of a safe judgment", () => {
    expect(parseJudgmentResponse('{"vulnerable": false}')).toEqual({
      vulnerable: false,
      confidence: null,
      severity: null,
      condition: "",
      explanation: "",
    });
  });

  it("should reject a vulnerable judgment without a condition", () => {
    expect(() =>
      parseJudgmentResponse('{"vulnerable": true, "confidence": "high", "explanation": "unguarded"}'),
    ).toThrow("Response does not match the verdict schema: condition: Required");
  });

  it("should reject a blank condition", () => {
    expect(() =>
      parseJudgmentResponse(
        '{"vulnerable": true, "confidence": "low", "condition": "   ", "explanation": "unguarded"}',
      ),
    ).toThrow(SchemaError);
  });

  it("should reject a confidence outside [0, 1]", () => {
    expect(() =>
      parseJudgmentResponse('{"vulnerable": false, "confidence": 1.5}'),
    ).toThrow(SchemaError);
  });

  it("should reject an unknown confidence level", () => {
    expect(() =>
      parseJudgmentResponse('{"vulnerable": false, "confidence": "certain"}'),
    ).toThrow(SchemaError);
  });

  it("should reject a response without the vulnerable flag", () => {
    expect(() => parseJudgmentResponse('{"confidence": "high"}')).toThrow(
      /^Response does not match the verdict schema: vulnerable: /,
    );
  });

  it("should reject malformed JSON", () => {
    expect(() => parseJudgmentResponse("{vulnerable: yes}")).toThrow(/^Response is not valid JSON: /);
  });

  it("should keep the raw text on the error", () => {
    try {
      parseJudgmentResponse("not json at all");
      throw new Error("expected a SchemaError");
    } catch (error: unknown) {
      expect(error).toBeInstanceOf(SchemaError);
      if (error instanceof SchemaError) {
        expect(error.responseText).toBe("not json at all");
        expect(error.code).toBe("SCHEMA_MISMATCH");
      }
    }
  });
});

import { describe, it, expect } from "vitest";
import { cleanRecommendation, parseRecommendation } from "./parse.js";

const REPLY = [
  "",
  "### Pattern Identified",
  "- Between 2-5 AM glucose drops from 7.0 to 3.8 mmol/L",
  "",
  "### Recommended Change",
  "- Reduce basal from 0.8 to 0.7 U/hr, 01:00-04:00",
  "",
  "### Expected Outcome",
  "- Overnight lows above 4.4 mmol/L",
  "```",
].join("\n");

describe("cleanRecommendation", () => {
  it("strips opening and closing fences", () => {
    expect(cleanRecommendation("```markdown\nHello\n```")).toBe("Hello");
    expect(cleanRecommendation("```\nHello\n```\n")).toBe("Hello");
  });

  it("strips a trailing fence left after the prefill", () => {
    expect(cleanRecommendation("\nHello\n```")).toBe("Hello");
  });

  it("leaves unfenced text alone", () => {
    expect(cleanRecommendation("  plain text  ")).toBe("plain text");
  });
});

describe("parseRecommendation", () => {
  it("splits the three sections", () => {
    const result = parseRecommendation(REPLY);

    expect(result.text.startsWith("### Pattern Identified")).toBe(true);
    expect(result.text.endsWith("above 4.4 mmol/L")).toBe(true);
    expect(result.sections).toEqual({
      pattern: "- Between 2-5 AM glucose drops from 7.0 to 3.8 mmol/L",
      change: "- Reduce basal from 0.8 to 0.7 U/hr, 01:00-04:00",
      outcome: "- Overnight lows above 4.4 mmol/L",
    });
  });

  it("matches headings case-insensitively and ignores unknown ones", () => {
    const result = parseRecommendation(
      "### PATTERN IDENTIFIED\nlow at night\n### Notes\nignored\n### expected outcome\nfewer lows"
    );

    expect(result.sections).toEqual({ pattern: "low at night", outcome: "fewer lows" });
  });

  it("returns no sections for free text", () => {
    expect(parseRecommendation("Not enough data.").sections).toEqual({});
  });
});

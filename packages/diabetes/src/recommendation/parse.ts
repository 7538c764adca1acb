/**
 * Model output cleanup
 */

export interface RecommendationSections {
  pattern?: string;
  change?: string;
  outcome?: string;
}

export interface Recommendation {
  text: string;
  sections: RecommendationSections;
}

const HEADINGS: Record<string, keyof RecommendationSections> = {
  "pattern identified": "pattern",
  "recommended change": "change",
  "expected outcome": "outcome",
};

/**
 * Strip the markdown fence the prefill opens, and its closing fence
 */
export function cleanRecommendation(text: string): string {
  return text
    .trim()
    .replace(/^```(?:markdown)?[^\S\n]*\n?/i, "")
    .replace(/\n?```\s*$/, "")
    .trim();
}

export function parseRecommendation(raw: string): Recommendation {
  const text = cleanRecommendation(raw);
  const sections: RecommendationSections = {};

  let current: keyof RecommendationSections | null = null;
  let body: string[] = [];

  const flush = () => {
    if (current) sections[current] = body.join("\n").trim();
  };

  for (const line of text.split("\n")) {
    const heading = line.match(/^###\s+(.+?)\s*$/);
    if (heading) {
      flush();
      current = HEADINGS[heading[1].toLowerCase()] ?? null;
      body = [];
    } else if (current) {
      body.push(line);
    }
  }
  flush();

  return { text, sections };
}

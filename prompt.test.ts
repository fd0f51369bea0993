import { describe, it, expect } from "vitest";
import {
  buildGapPrompt,
  buildInitialQueryPrompt,
  buildRefinementQueryPrompt,
  buildSourceDigest,
  buildSummaryPrompt,
  parseKnowledgeGaps,
} from "./prompt.js";

describe("parseKnowledgeGaps", () => {
  it("strips bullets and drops blank lines", () => {
    expect(parseKnowledgeGaps("- Gap one\n- Gap two\n\n- Gap three")).toEqual(["Gap one", "Gap two", "Gap three"]);
  });

  it("accepts other bullet markers and indentation", () => {
    expect(parseKnowledgeGaps("  * Pricing data\n• Regional split\n   -  Churn ")).toEqual([
      "Pricing data",
      "Regional split",
      "Churn",
    ]);
  });

  it("passes through any number of gaps", () => {
    expect(parseKnowledgeGaps("- one")).toEqual(["one"]);
    expect(parseKnowledgeGaps("- a\n- b\n- c\n- d\n- e")).toHaveLength(5);
    expect(parseKnowledgeGaps("")).toEqual([]);
  });

  it("keeps lines without a bullet", () => {
    expect(parseKnowledgeGaps("No market size for 2025")).toEqual(["No market size for 2025"]);
  });

  it("strips only the bullet and keeps markdown emphasis", () => {
    expect(parseKnowledgeGaps("- **Pricing data**: per-kWh tariffs\n* *Regional split*")).toEqual([
      "**Pricing data**: per-kWh tariffs",
      "*Regional split*",
    ]);
  });

  it("keeps a bold gap intact", () => {
    expect(parseKnowledgeGaps("- **Bold gap**")).toEqual(["**Bold gap**"]);
    expect(parseKnowledgeGaps("**Unbulleted bold gap**")).toEqual(["**Unbulleted bold gap**"]);
  });
});

describe("buildInitialQueryPrompt", () => {
  it("embeds the request context and the length limit", () => {
    const prompt = buildInitialQueryPrompt(
      {
        domain: "EV charging",
        companyName: "ChargePoint",
        metrics: ["market share", "growth rate"],
        customOperator: "SWOT analysis",
      },
      400
    );

    expect(prompt).toContain("market research about: EV charging\n");
    expect(prompt).toContain("Focusing on company: ChargePoint");
    expect(prompt).toContain("Analyzing metrics: market share, growth rate");
    expect(prompt).toContain("Using analysis method: SWOT analysis");
    expect(prompt).toContain("- Be under 400 characters");
  });

  it("omits absent optional context", () => {
    const prompt = buildInitialQueryPrompt({ domain: "EV charging" }, 400);

    expect(prompt).not.toContain("Focusing on company");
    expect(prompt).not.toContain("Analyzing metrics");
    expect(prompt).not.toContain("Using analysis method");
  });
});

describe("buildRefinementQueryPrompt", () => {
  it("includes the summary and comma-joined gaps", () => {
    const prompt = buildRefinementQueryPrompt("EV charging", "prior summary", ["A", "B"], 300);

    expect(prompt).toContain("## PREVIOUS SUMMARY\nprior summary\n");
    expect(prompt).toContain("## KNOWLEDGE GAPS\nA, B\n");
    expect(prompt).toContain("- Be under 300 characters");
  });
});

describe("buildSourceDigest", () => {
  it("numbers sources and truncates content", () => {
    const digest = buildSourceDigest(
      [
        { title: "First", url: "https://a.example", content: "abcdefghij" },
        { title: "Second", url: "", content: "" },
      ],
      4
    );

    expect(digest).toBe(
      "Source 1: First\nURL: https://a.example\nContent: abcd...\n\n" +
        "Source 2: Second\nURL: No URL\nContent: No content..."
    );
  });
});

describe("buildSummaryPrompt", () => {
  it("adds metrics context when present", () => {
    const prompt = buildSummaryPrompt([], "EV charging", ["market share"], 2000);

    expect(prompt.split("\n")[0]).toBe(
      "Synthesize a comprehensive summary from these search results about EV charging focusing on market share:"
    );
    expect(prompt).toContain("Organize the summary clearly with headings.");
  });

  it("leaves metrics out when empty", () => {
    const prompt = buildSummaryPrompt([], "EV charging", [], 2000);

    expect(prompt.split("\n")[0]).toBe("Synthesize a comprehensive summary from these search results about EV charging:");
  });
});

describe("buildGapPrompt", () => {
  it("asks for a bulleted list over the summary", () => {
    const prompt = buildGapPrompt("EV charging", "the summary");

    expect(prompt).toContain("## SUMMARY\nthe summary\n");
    expect(prompt.endsWith("Return only a bulleted list of the key gaps, nothing else.")).toBe(true);
  });
});

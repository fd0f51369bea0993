import { describe, it, expect, vi, afterEach } from "vitest";
import { conductMarketResearch, requestFromAnswers } from "./client.js";
import type { ResearchResponse } from "./types.js";

const response: ResearchResponse = {
  final_analysis: "Final report",
  iterations: [{ iteration: 1, query: "q", sources_found: 1, summary: "s", knowledge_gaps: [] }],
  all_sources: [{ title: "T", url: "https://t.example", content: "C" }],
};

function stubFetch(ok: boolean, status: number, bodyText: string) {
  const fetchMock = vi.fn().mockResolvedValue({ ok, status, text: () => Promise.resolve(bodyText) });
  vi.stubGlobal("fetch", fetchMock);
  return fetchMock;
}

describe("conductMarketResearch", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("posts the request in wire format and attaches metadata", async () => {
    const fetchMock = stubFetch(true, 200, JSON.stringify(response));

    const report = await conductMarketResearch(
      { domain: "EV charging", metrics: ["market share"] },
      { apiUrl: "http://api.test/research", timeoutMs: 1000 }
    );

    expect(report).toMatchObject(response);
    expect(report.metadata?.api_status).toBe("success");
    expect(report.metadata?.processing_time_sec).toBeGreaterThanOrEqual(0);

    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe("http://api.test/research");
    expect(init.method).toBe("POST");
    expect(JSON.parse(init.body)).toEqual({
      domain: "EV charging",
      company_name: null,
      metrics: ["market share"],
      custom_operator: null,
    });
  });

  it("surfaces the API's detail message on error", async () => {
    stubFetch(false, 400, JSON.stringify({ detail: "No relevant sources found" }));

    await expect(conductMarketResearch({ domain: "x" })).rejects.toThrow("API Error: No relevant sources found");
  });

  it("serializes structured error details", async () => {
    stubFetch(false, 422, JSON.stringify({ detail: [{ path: ["domain"] }] }));

    await expect(conductMarketResearch({ domain: "x" })).rejects.toThrow('API Error: [{"path":["domain"]}]');
  });

  it("falls back to the raw body or status", async () => {
    stubFetch(false, 502, "Bad gateway");
    await expect(conductMarketResearch({ domain: "x" })).rejects.toThrow("API Error: Bad gateway");

    stubFetch(false, 503, "");
    await expect(conductMarketResearch({ domain: "x" })).rejects.toThrow("API Error: HTTP 503");
  });

  it("rejects a success response that is not JSON", async () => {
    stubFetch(true, 200, "<html>");

    await expect(conductMarketResearch({ domain: "x" })).rejects.toThrow("Invalid JSON response from API");
  });

  it("rejects a success response that is not a research result", async () => {
    stubFetch(true, 200, JSON.stringify({ status: "queued" }));

    await expect(conductMarketResearch({ domain: "x" })).rejects.toThrow("Invalid research response from API");
  });

  it("rejects iterations with the wrong shape", async () => {
    stubFetch(true, 200, JSON.stringify({ ...response, iterations: [{ iteration: 1, query: "q" }] }));

    await expect(conductMarketResearch({ domain: "x" })).rejects.toThrow("Invalid research response from API");
  });
});

describe("requestFromAnswers", () => {
  it("splits metrics and drops blank answers", () => {
    expect(
      requestFromAnswers({ domain: " EV charging ", companyName: "", metrics: "market share, growth rate,", customOperator: " " })
    ).toEqual({ domain: "EV charging", metrics: ["market share", "growth rate"] });
  });

  it("keeps filled answers", () => {
    expect(
      requestFromAnswers({ domain: "EV", companyName: "ChargePoint", metrics: "", customOperator: "SWOT" })
    ).toEqual({ domain: "EV", companyName: "ChargePoint", customOperator: "SWOT" });
  });
});

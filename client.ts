import { ResearchResponseSchema } from "./schemas.js";
import type { ResearchReport, ResearchRequest } from "./types.js";

export const DEFAULT_API_URL = "http://localhost:8000/research";
/** 5 minutes */
export const DEFAULT_TIMEOUT_MS = 300_000;

export interface ClientOptions {
  apiUrl?: string;
  timeoutMs?: number;
}

export type CliAnswers = {
  domain: string;
  companyName: string;
  metrics: string;
  customOperator: string;
};

/** Blank answers become absent fields; metrics are comma-separated. */
export function requestFromAnswers(answers: CliAnswers): ResearchRequest {
  const metrics = answers.metrics
    .split(",")
    .map((m) => m.trim())
    .filter(Boolean);

  return {
    domain: answers.domain.trim(),
    companyName: answers.companyName.trim() || undefined,
    metrics: metrics.length > 0 ? metrics : undefined,
    customOperator: answers.customOperator.trim() || undefined,
  };
}

function detailOf(bodyText: string): string {
  try {
    const parsed: unknown = JSON.parse(bodyText);
    if (typeof parsed === "object" && parsed !== null && "detail" in parsed) {
      const { detail } = parsed;
      return typeof detail === "string" ? detail : JSON.stringify(detail);
    }
  } catch {
    // not JSON: fall through to raw text
  }
  return bodyText;
}

/**
 * POST a research request to the API and attach timing metadata.
 */
export async function conductMarketResearch(
  request: ResearchRequest,
  options: ClientOptions = {}
): Promise<ResearchReport> {
  const payload = {
    domain: request.domain,
    company_name: request.companyName ?? null,
    metrics: request.metrics ?? [],
    custom_operator: request.customOperator ?? null,
  };

  const t0 = Date.now();
  const response = await fetch(options.apiUrl ?? DEFAULT_API_URL, {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body: JSON.stringify(payload),
    signal: AbortSignal.timeout(options.timeoutMs ?? DEFAULT_TIMEOUT_MS),
  });

  const bodyText = await response.text();
  if (!response.ok) {
    throw new Error(`API Error: ${detailOf(bodyText) || `HTTP ${response.status}`}`);
  }

  let json: unknown;
  try {
    json = JSON.parse(bodyText);
  } catch {
    throw new Error("Invalid JSON response from API");
  }
  const parsed = ResearchResponseSchema.safeParse(json);
  if (!parsed.success) throw new Error("Invalid research response from API");
  const data = parsed.data;

  const processingTime = (Date.now() - t0) / 1000;
  return {
    ...data,
    metadata: {
      processing_time_sec: Math.round(processingTime * 100) / 100,
      api_status: "success",
    },
  };
}

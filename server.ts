/**
 * HTTP front end
 *
 *   POST /research  → runs the iterative loop, returns the full trail
 *   GET  /health    → liveness
 *
 * Status codes: 200 result, 400 no sources on the first iteration, 413 body
 * over MAX_BODY_BYTES, 422 a body that is not JSON or fails the schema, 500
 * any other failure. Error bodies are { detail }.
 */

import http from "node:http";
import { runMarketResearch, type ResearchContext } from "./agent.js";
import { PayloadTooLargeError, RequestValidationError, ResearchError, errorMessage } from "./errors.js";
import { ResearchRequestSchema } from "./schemas.js";
import type { ResearchRequest, ResearchResponse, ResearchResult } from "./types.js";

export function parseResearchRequest(body: unknown): ResearchRequest {
  const parsed = ResearchRequestSchema.safeParse(body);
  if (!parsed.success) throw new RequestValidationError(parsed.error.issues);

  const { domain, company_name, metrics, custom_operator } = parsed.data;
  return {
    domain,
    companyName: company_name || undefined,
    metrics: metrics?.length ? metrics : undefined,
    customOperator: custom_operator || undefined,
  };
}

export function toResearchResponse(result: ResearchResult): ResearchResponse {
  return {
    final_analysis: result.finalAnalysis,
    iterations: result.iterations.map((it) => ({
      iteration: it.iteration,
      query: it.query,
      sources_found: it.sourcesFound,
      summary: it.summary,
      knowledge_gaps: it.knowledgeGaps,
    })),
    all_sources: result.allSources,
  };
}

export interface HandlerResult {
  status: number;
  body: unknown;
}

export async function handleResearchRequest(
  body: unknown,
  ctx: ResearchContext
): Promise<HandlerResult> {
  try {
    const request = parseResearchRequest(body);
    const result = await runMarketResearch(request, ctx);
    return { status: 200, body: toResearchResponse(result) };
  } catch (error) {
    if (error instanceof RequestValidationError) {
      return { status: error.statusCode, body: { detail: error.issues } };
    }
    if (error instanceof ResearchError) {
      if (error.statusCode >= 500) console.error(`❌ Research failed: ${error.message}`);
      return { status: error.statusCode, body: { detail: error.message } };
    }
    console.error("❌ Research failed:", error);
    return { status: 500, body: { detail: `Research failed: ${errorMessage(error)}` } };
  }
}

function sendJson(res: http.ServerResponse, status: number, body: unknown): void {
  res.writeHead(status, { "Content-Type": "application/json" });
  res.end(JSON.stringify(body));
}

export const MAX_BODY_BYTES = 256 * 1024;

/**
 * Buffers at most `limit` bytes. Past that the rest of the stream is drained
 * unbuffered so the connection can still carry a 413.
 */
export async function readBody(
  stream: AsyncIterable<Buffer | string>,
  limit: number = MAX_BODY_BYTES
): Promise<string> {
  const chunks: Buffer[] = [];
  let size = 0;
  for await (const chunk of stream) {
    size += Buffer.byteLength(chunk);
    if (size <= limit) chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk));
  }
  if (size > limit) throw new PayloadTooLargeError(limit);
  return Buffer.concat(chunks).toString("utf-8");
}

export function createResearchServer(ctx: ResearchContext): http.Server {
  return http.createServer(async (req, res) => {
    const url = new URL(req.url ?? "/", "http://localhost");

    try {
      if (req.method === "GET" && url.pathname === "/health") {
        sendJson(res, 200, { status: "ok", uptime: process.uptime() });
        return;
      }

      if (req.method === "POST" && url.pathname === "/research") {
        const text = await readBody(req);
        let body: unknown;
        try {
          body = JSON.parse(text);
        } catch {
          sendJson(res, 422, { detail: "Request body must be valid JSON" });
          return;
        }

        const t0 = Date.now();
        const { status, body: payload } = await handleResearchRequest(body, ctx);
        console.log(`  ↩️ POST /research ${status} in ${((Date.now() - t0) / 1000).toFixed(1)}s`);
        sendJson(res, status, payload);
        return;
      }

      sendJson(res, 404, { detail: "Not Found" });
    } catch (error) {
      if (error instanceof PayloadTooLargeError) {
        sendJson(res, error.statusCode, { detail: error.message });
        return;
      }
      console.error("❌ Request handling failed:", error);
      if (!res.headersSent) sendJson(res, 500, { detail: errorMessage(error) });
      else res.end();
    }
  });
}

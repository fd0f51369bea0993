// --- Request ---

export interface ResearchRequest {
  domain: string;
  companyName?: string;
  metrics?: string[];
  /** Analysis method to apply, e.g. "SWOT analysis" */
  customOperator?: string;
}

// --- Sources ---

export interface Source {
  title: string;
  url: string;
  content: string;
}

/** Search collaborators return loosely-typed records; see toSource() */
export type RawSearchResult = Record<string, unknown>;

// --- Research Result ---

export interface IterationRecord {
  iteration: number; // 1-based
  query: string;
  sourcesFound: number;
  summary: string;
  knowledgeGaps: string[]; // empty on the final iteration
}

export interface ResearchResult {
  finalAnalysis: string;
  iterations: IterationRecord[];
  allSources: Source[];
}

// --- Wire format (HTTP) ---

export interface IterationPayload {
  iteration: number;
  query: string;
  sources_found: number;
  summary: string;
  knowledge_gaps: string[];
}

export interface ResearchResponse {
  final_analysis: string;
  iterations: IterationPayload[];
  all_sources: Source[];
}

export interface ResearchReport extends ResearchResponse {
  metadata?: {
    processing_time_sec: number;
    api_status: string;
  };
}

// --- Progress callback ---

export type ProgressCallback = (status: string) => void;

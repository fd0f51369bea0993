import dotenv from "dotenv";
dotenv.config({ override: true });

import { loadConfig } from "./config.js";
import { createLlmClient } from "./llm.js";
import { createSearchProvider } from "./search.js";
import { createResearchServer } from "./server.js";

const PORT = parseInt(process.env.PORT || "8000");

const config = loadConfig();
const server = createResearchServer({
  config,
  llm: createLlmClient(config),
  search: createSearchProvider(config),
});

server.listen(PORT, () => {
  console.log(`🚀 Iterative Market Research API on http://localhost:${PORT}`);
  console.log(
    `⚙️ ${config.llmProvider} (${config.queryModel} / ${config.researchModel}), ` +
      `${config.searchProvider} search, ${config.maxIterations} iterations`
  );
});

import { config as loadEnv } from "dotenv";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { loadConfig } from "./config.js";
import { SubsetPipelineError } from "./errors.js";
import { loadCatalog } from "./lib/catalog.js";
import { loadLandMask } from "./lib/landMask.js";
import { createLogger } from "./logger.js";
import { createArchiveClient } from "./services/archiveClient.js";
import { buildPipelineContext, runPipeline } from "./services/pipeline.js";
import { ResultStore } from "./services/resultStore.js";

const thisDir = path.dirname(fileURLToPath(import.meta.url));
const projectRoot = path.resolve(thisDir, "..");
const envFiles = [".env", ".env.local"];
for (const file of envFiles) {
  loadEnv({ path: path.join(projectRoot, file), override: file === ".env.local" });
}

async function main() {
  const config = loadConfig();
  const logger = createLogger(config);

  try {
    const catalog = await loadCatalog(config.CATALOG_PATH);
    const client = createArchiveClient({
      timeoutMs: config.REQUEST_TIMEOUT_MS,
      username: config.OPENDAP_USERNAME,
      password: config.OPENDAP_PASSWORD
    });
    const landMask = config.LAND_MASK_PATH ? await loadLandMask(config.LAND_MASK_PATH) : null;
    const context = buildPipelineContext({ request: config.request, catalog, client, logger, landMask });
    const result = await runPipeline(context);

    const store = new ResultStore(config.OUTPUT_DIR);
    const outputPath = await store.write(result);
    logger.info({ outputPath, rowCount: result.dataset.rows.length }, `Saved to ${outputPath}`);
  }
  catch (err) {
    const reason = err instanceof SubsetPipelineError ? err.reason : "UNEXPECTED";
    logger.error({ err, reason }, "Subset pipeline failed");
    process.exitCode = 1;
  }
}

main().catch((err: unknown) => {
  createLogger({ LOG_LEVEL: "info" }).error({ err }, "Invalid configuration");
  process.exitCode = 1;
});

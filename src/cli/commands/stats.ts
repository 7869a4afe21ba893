import type { Settings } from "../../config/settings.js";
import { createVectorStore } from "../../services.js";

export async function runStatsCommand(settings: Settings): Promise<void> {
  const info = await createVectorStore(settings).describe();
  const name = settings.vectorStore === "local" ? settings.localIndexPath : settings.pineconeIndex;
  process.stdout.write(
    `${settings.vectorStore} index ${name}\n` +
      `  records:   ${info.totalRecords}\n` +
      `  dimension: ${info.dimension ?? "unset"} (expected ${settings.embeddingDimension})\n` +
      `  metric:    ${info.metric}\n`
  );
}

#!/usr/bin/env node
/**
 * index.ts - CLI entry point for rag-datacore
 *
 * What this file does:
 * A thin command-line wrapper over bootstrap.ts for operating the data
 * store by hand: inspecting collections, adding and querying documents,
 * and generating an ENCRYPTION_KEY.
 *
 *   rag-datacore generate-key
 *   rag-datacore collections
 *   rag-datacore add support-articles "How do refunds work?" --ids faq-1
 *   rag-datacore query support-articles "refund" -n 3
 *
 * Settings come from the environment; a .env file in the working
 * directory is loaded first.
 */

import "dotenv/config";

import { Command } from "commander";
import { createDataCore, type DataCore } from "./bootstrap";
import { loadConfig } from "./config";
import { generateEncryptionKey } from "./credentials";
import { initializeTracing } from "./tracing";

/**
 * Runs `fn` against a freshly built DataCore and always closes it.
 * Sets a non-zero exit code when `fn` reports failure.
 */
async function withDataCore(fn: (core: DataCore) => Promise<boolean>): Promise<void> {
  const core = createDataCore(loadConfig());
  try {
    const ok = await fn(core);
    if (!ok) process.exitCode = 1;
  } finally {
    await core.close();
  }
}

function collectIds(value: string, previous: string[]): string[] {
  return [...previous, value];
}

async function main() {
  initializeTracing();

  const program = new Command();

  program
    .name("rag-datacore")
    .description("Embedding, vector collection and credential storage for RAG chatbots")
    .version("0.1.0");

  program
    .command("generate-key")
    .description("Print a new random ENCRYPTION_KEY (base64, 32 bytes)")
    .action(() => {
      console.log(generateEncryptionKey());
    });

  program
    .command("collections")
    .description("List collection names")
    .action(() =>
      withDataCore(async (core) => {
        const names = await core.collections.listCollections();
        for (const name of names) console.log(name);
        return true;
      })
    );

  program
    .command("count")
    .argument("<name>", "Collection name")
    .description("Print the number of documents in a collection (-1 if unknown)")
    .action((name: string) =>
      withDataCore(async (core) => {
        const count = await core.collections.getCollectionCount(name);
        console.log(count);
        return count >= 0;
      })
    );

  program
    .command("add")
    .argument("<collection>", "Collection name (created if missing)")
    .argument("<texts...>", "Documents to add")
    .option("--ids <id>", "Document id, once per text", collectIds, [])
    .description("Embed and add documents to a collection")
    .action((collection: string, texts: string[], options: { ids: string[] }) =>
      withDataCore(async (core) => {
        await core.collections.getOrCreateCollection(collection);
        const added = await core.collections.addDocuments(collection, texts, {
          ...(options.ids.length > 0 ? { ids: options.ids } : {}),
        });
        console.log(added ? `Added ${texts.length} document(s) to ${collection}` : "Add failed; see log");
        return added;
      })
    );

  program
    .command("query")
    .argument("<collection>", "Collection name")
    .argument("<text>", "Query text")
    .option("-n, --n-results <n>", "Number of matches", "5")
    .description("Print the nearest documents as JSON")
    .action((collection: string, text: string, options: { nResults: string }) =>
      withDataCore(async (core) => {
        const result = await core.collections.queryDocuments(collection, text, {
          nResults: Number.parseInt(options.nResults, 10),
        });
        if (!result) {
          console.error("Query failed; see log");
          return false;
        }
        console.log(JSON.stringify(result, null, 2));
        return true;
      })
    );

  program
    .command("delete-collection")
    .argument("<name>", "Collection name")
    .description("Delete a collection and all of its documents")
    .action((name: string) =>
      withDataCore(async (core) => {
        const deleted = await core.collections.deleteCollection(name);
        console.log(deleted ? `Deleted ${name}` : `No collection named ${name}`);
        return deleted;
      })
    );

  await program.parseAsync(process.argv);
}

main().catch((error: unknown) => {
  console.error("Error:", error instanceof Error ? error.message : String(error));
  process.exit(1);
});

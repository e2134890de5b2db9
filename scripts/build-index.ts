/**
 * Builds the endpoint/schema search store from an OpenAPI document.
 */

import { program } from "commander";
import { getSearchConfig } from "@/lib/config";
import { describeError } from "@/lib/errors";
import { buildSearchStore } from "@/lib/index-build";

type CliOptions = {
  spec?: string;
  db?: string;
};

const config = getSearchConfig();

program
  .name("build-index")
  .description("Build the API search database from an OpenAPI document")
  .option("--spec <file>", "OpenAPI document (YAML or JSON)", config.specPath)
  .option("--db <file>", "Output SQLite database", config.dbPath);

program.parse();

const options = program.opts<CliOptions>();

async function main(): Promise<void> {
  const specPath = options.spec ?? config.specPath;
  const dbPath = options.db ?? config.dbPath;

  console.error(`Reading OpenAPI document: ${specPath}`);
  const result = await buildSearchStore(specPath, dbPath);

  console.error(`Search database written: ${result.dbPath}`);
  console.error(`  Endpoints: ${result.endpoints}`);
  console.error(`  Schemas:   ${result.schemas}`);
  for (const [method, count] of Object.entries(result.methods)) {
    console.error(`  ${method.padEnd(7)} ${count}`);
  }
}

main().catch((error: unknown) => {
  console.error("[build-index] failed", { reason: describeError(error) });
  process.exitCode = 1;
});

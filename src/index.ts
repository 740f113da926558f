#!/usr/bin/env node
import * as dotenv from "dotenv";
import { loadConfig } from "./config/env";
import { processShiftFile } from "./mainProcessor";
import { createApp } from "./server";

async function main(): Promise<void> {
  dotenv.config();
  const config = loadConfig();

  if (process.argv.includes("--serve")) {
    createApp(config).listen(config.port, () => {
      console.log(`🚀 Server running at http://localhost:${config.port}`);
    });
    return;
  }

  const { valid, needs, shifts, summary } = await processShiftFile(config);
  const schemaState = valid ? "valid" : "INVALID";
  const verb = summary.dryRun ? "previewed" : "submitted";
  console.log(
    `Done: ${shifts} shift(s) across ${needs} need(s), ` +
      `schema ${schemaState}, ${summary.submitted} ${verb}`
  );
}

main().catch((err: unknown) => {
  console.error(`❌ ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
});

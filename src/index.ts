#!/usr/bin/env node
import "dotenv/config";
import { runCli } from "./cli";
import { loadConfig } from "./config";
import { createProvisioner } from "./provision";

async function main(): Promise<number> {
  try {
    return await runCli(createProvisioner(loadConfig()));
  } catch (error) {
    console.error("[provision] unexpected error:", error);
    return 1;
  }
}

main().then((code) => {
  process.exitCode = code;
});

#!/usr/bin/env node
import { Command } from "commander";
import { readFileSync } from "fs";
import { z } from "zod";
import { registerSyncCommand } from "./modules/sync.js";
import { registerConfigCommands } from "./modules/config-cmd.js";

const pkg = z
  .object({ version: z.string() })
  .parse(JSON.parse(readFileSync(new URL("../package.json", import.meta.url), "utf-8")));

export async function main(argv = process.argv): Promise<void> {
  const program = new Command()
    .name("cmorph-sync")
    .description("Mirror the CMORPH v1.0 8km/30min dataset from rda.ucar.edu")
    .version(pkg.version);

  registerSyncCommand(program);
  registerConfigCommands(program);

  try {
    await program.parseAsync(argv);
  } catch (error) {
    console.error(error instanceof Error ? error.message : String(error));
    process.exitCode = 1;
  }
}

void main();

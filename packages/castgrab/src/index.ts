#!/usr/bin/env node
import { Command } from "commander";
import { readFileSync } from "fs";
import { z } from "zod";
import { initContext } from "./lib/cli-context.js";
import { createRuntime, type RuntimeProvider } from "./lib/runtime.js";
import { renderUnknownError } from "./lib/errors/renderer.js";
import { registerShowCommands } from "./modules/shows.js";
import { registerDownloadCommand } from "./modules/download.js";
import { registerConfigCommands } from "./modules/config-cmd.js";

interface GlobalOptions {
  config?: string;
}

const PackageSchema = z.object({ version: z.string() });

function readVersion(): string {
  const raw: unknown = JSON.parse(readFileSync(new URL("../package.json", import.meta.url), "utf-8"));
  return PackageSchema.parse(raw).version;
}

export async function main(argv = process.argv): Promise<void> {
  const context = initContext(argv);

  const program = new Command()
    .name("castgrab")
    .description("List a podcast feed's episodes and download them")
    .version(readVersion())
    .option("--config <path>", "Use this config file instead of the system and user files")
    .option("--json", "Output JSON instead of text")
    .option("-q, --quiet", "Hide spinners and progress")
    .option("-y, --yes", "Answer yes to every confirmation")
    .option("--no-input", "Never prompt; fail instead")
    .option("-v, --verbose", "Log debug output");

  const runtime: RuntimeProvider = (overrides) =>
    createRuntime(
      { configPath: program.opts<GlobalOptions>().config, verbose: context.verbose },
      overrides
    );

  registerShowCommands(program, runtime);
  registerDownloadCommand(program, runtime);
  registerConfigCommands(program);

  try {
    await program.parseAsync(argv);
  } catch (error) {
    renderUnknownError(error);
    process.exitCode = 1;
  }
}

void main();

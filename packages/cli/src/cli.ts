import fs from "fs";
import { Command, CommanderError } from "commander";
import { z } from "zod";
import { EXIT_SUCCESS } from "./errors/error-handler.js";
import { runPlanner, type PlannerDeps } from "./services/planner.service.js";

const packageJsonSchema = z.object({ version: z.string() });

/** Version from the package's own package.json (one level above src/ and dist/). */
export function readPackageVersion(): string {
  const raw = fs.readFileSync(new URL("../package.json", import.meta.url), "utf-8");
  return packageJsonSchema.parse(JSON.parse(raw)).version;
}

type CliOptions = {
  provider?: string;
  model?: string;
};

/**
 * Parse argv (without the node and script entries) and run the planner.
 * Returns the exit status; --help and --version return 0 without running.
 */
export async function runCli(argv: string[], deps: PlannerDeps): Promise<number> {
  let exitCode = EXIT_SUCCESS;

  const program = new Command()
    .name("plan")
    .description(
      "Turn a feature idea into a feature plan and an execution spec through a guided conversation"
    )
    .version(readPackageVersion())
    .argument("[idea...]", "initial feature idea")
    .option("-p, --provider <provider>", "model provider: openai or claude")
    .option("-m, --model <model>", "model name for the selected provider")
    .exitOverride()
    .configureOutput({
      writeOut: (str) => deps.terminal.info(str.trimEnd()),
      writeErr: (str) => deps.terminal.info(str.trimEnd()),
    })
    .action(async (ideaParts: string[]) => {
      const options = program.opts<CliOptions>();
      exitCode = await runPlanner(
        { ideaParts, overrides: { provider: options.provider, model: options.model } },
        deps
      );
    });

  try {
    await program.parseAsync(argv, { from: "user" });
  } catch (err) {
    if (err instanceof CommanderError) return err.exitCode;
    throw err;
  }
  return exitCode;
}

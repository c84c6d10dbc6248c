import fs from "fs/promises";
import path from "path";
import { PLANNER_PATHS, getPlanFilename, getSpecFilename } from "@feature-planner/shared";
import { AppError } from "../errors/error-handler.js";
import { ErrorCodes } from "../errors/error-codes.js";
import { AGENT_INSTRUCTIONS_CONTENT } from "../prompts/index.js";
import { getErrorMessage } from "../utils/error-utils.js";
import { createLogger } from "../utils/logger.js";

const log = createLogger("artifact-writer");

export interface WrittenArtifact {
  filename: string;
  filePath: string;
  status: "created" | "skipped";
}

function isFileExistsError(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "EEXIST";
}

/** Writes the generated documents into one output directory (the working directory). */
export class ArtifactWriter {
  constructor(private readonly dir: string) {}

  /** Overwrites `<base>.plan.md`. */
  writePlan(baseName: string, content: string): Promise<WrittenArtifact> {
    return this.write(getPlanFilename(baseName), content, "w");
  }

  /** Overwrites `<base>.spec.md`. */
  writeSpec(baseName: string, content: string): Promise<WrittenArtifact> {
    return this.write(getSpecFilename(baseName), content, "w");
  }

  /** Creates AGENT_INSTRUCTIONS.md unless it already exists; an existing file is left untouched. */
  writeAgentInstructions(): Promise<WrittenArtifact> {
    return this.write(PLANNER_PATHS.agentInstructions, AGENT_INSTRUCTIONS_CONTENT, "wx");
  }

  private async write(filename: string, content: string, flag: "w" | "wx"): Promise<WrittenArtifact> {
    const filePath = path.join(this.dir, filename);
    try {
      await fs.writeFile(filePath, content, { encoding: "utf-8", flag });
    } catch (err) {
      if (flag === "wx" && isFileExistsError(err)) {
        log.debug("Artifact exists, skipping", { filePath });
        return { filename, filePath, status: "skipped" };
      }
      throw new AppError(
        ErrorCodes.ARTIFACT_WRITE_FAILED,
        `Could not write ./${filename}: ${getErrorMessage(err)}`,
        { filePath }
      );
    }
    log.info("Artifact written", { filePath, bytes: Buffer.byteLength(content) });
    return { filename, filePath, status: "created" };
  }
}

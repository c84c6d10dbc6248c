import fs from "fs/promises";
import path from "path";
import { z } from "zod";
import type { ContextPayload, LoadedContext } from "@feature-planner/shared";
import {
  DEFAULT_PRODUCT_NAME,
  DEFAULT_STACK_DESCRIPTOR,
  GREENFIELD_CONTEXT_MESSAGE,
  PLANNER_PATHS,
} from "@feature-planner/shared";
import { AppError } from "../errors/error-handler.js";
import { ErrorCodes } from "../errors/error-codes.js";
import { getErrorMessage } from "../utils/error-utils.js";
import { createLogger } from "../utils/logger.js";

const log = createLogger("context-loader");

const contextPayloadSchema = z.record(z.string(), z.unknown());

/** Reads only the two fields the summary mentions; a section that is not an object is ignored. */
const contextSummarySchema = z.object({
  product: z.object({ name: z.unknown() }).optional().catch(undefined),
  engineering: z.object({ stack: z.unknown() }).optional().catch(undefined),
});

/** Called when project.context.json exists but cannot be used; loading continues with `{}`. */
export type ContextErrorHandler = (error: AppError) => void;

/**
 * Render a context value for the summary line: lists are joined with ", ",
 * objects are shown as JSON, other scalars as text. Absent or empty values yield undefined.
 */
export function describeContextValue(value: unknown): string | undefined {
  if (value === undefined || value === null) return undefined;
  if (Array.isArray(value)) {
    const items = value.flatMap((item) => {
      const text = describeContextValue(item);
      return text ? [text] : [];
    });
    return items.length > 0 ? items.join(", ") : undefined;
  }
  const text = typeof value === "object" ? JSON.stringify(value) : String(value);
  return text || undefined;
}

function summarize(payload: ContextPayload): string {
  const parsed = contextSummarySchema.safeParse(payload);
  const summary = parsed.success ? parsed.data : undefined;
  const productName = describeContextValue(summary?.product?.name) ?? DEFAULT_PRODUCT_NAME;
  const stack = describeContextValue(summary?.engineering?.stack) ?? DEFAULT_STACK_DESCRIPTOR;
  return `Context loaded from ./${PLANNER_PATHS.projectContext}. I see we're working on '${productName}' with a ${stack} stack.`;
}

async function readIfExists(filePath: string): Promise<string | null> {
  try {
    return await fs.readFile(filePath, "utf-8");
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") return null;
    throw err;
  }
}

/**
 * Load the optional project context from `<cwd>/project.context.json`.
 * - absent: empty payload and the greenfield message
 * - unreadable or not a JSON object: onError is called, empty payload, empty message
 * - otherwise: pretty-printed payload and a summary naming product and stack
 */
export async function loadProjectContext(
  cwd: string,
  onError: ContextErrorHandler = () => {}
): Promise<LoadedContext> {
  const filePath = path.join(cwd, PLANNER_PATHS.projectContext);
  const empty: LoadedContext = { payload: {}, contextJson: "{}", message: "" };

  let raw: string | null;
  try {
    raw = await readIfExists(filePath);
  } catch (err) {
    const error = new AppError(ErrorCodes.CONTEXT_PARSE_FAILED, getErrorMessage(err), { filePath });
    log.warn("Context file unreadable", { filePath, err: error.message });
    onError(error);
    return empty;
  }

  if (raw === null) {
    log.debug("No context file, starting greenfield", { filePath });
    return { ...empty, message: GREENFIELD_CONTEXT_MESSAGE };
  }

  let payload: ContextPayload;
  try {
    const result = contextPayloadSchema.safeParse(JSON.parse(raw));
    if (!result.success) {
      throw new Error("expected a JSON object at the top level");
    }
    payload = result.data;
  } catch (err) {
    const error = new AppError(ErrorCodes.CONTEXT_PARSE_FAILED, getErrorMessage(err), { filePath });
    log.warn("Context file could not be parsed", { filePath, err: error.message });
    onError(error);
    return empty;
  }

  log.info("Loaded project context", { filePath, keys: Object.keys(payload).length });
  return {
    payload,
    contextJson: JSON.stringify(payload, null, 2),
    message: summarize(payload),
  };
}

import { PLANNER_PATHS, parseExecutionSpec, sanitizeFilename } from "@feature-planner/shared";
import { createPlannerServices } from "../composition.js";
import { loadConfig, type ConfigOverrides, type PlannerConfig } from "../config.js";
import { AppError, EXIT_SUCCESS, isAppError, reportFatalError } from "../errors/error-handler.js";
import { ErrorCodes, type ErrorCode } from "../errors/error-codes.js";
import { buildSystemPrompt } from "../prompts/index.js";
import type { Terminal } from "../ui/terminal.js";
import { withSpinner } from "../ui/terminal.js";
import { getErrorMessage } from "../utils/error-utils.js";
import { createLogger, setLogLevel } from "../utils/logger.js";
import { ChatSession } from "./chat-session.js";
import { loadProjectContext } from "./context-loader.js";
import { runConversationLoop } from "./conversation.service.js";
import { generateFeatureName } from "./feature-name.service.js";
import { createModelClient, type ModelClient } from "./model-client.js";
import { formatHistoryForPrompt } from "./synthesis.service.js";

const log = createLogger("planner");

export const WELCOME_MESSAGE = "Welcome to the Feature Planner CLI";
export const FINISH_HINT = "(Type 'done' or 'exit' to finish and generate files)";

export interface PlannerRequest {
  /** Positional arguments; joined with spaces they form the idea */
  ideaParts: string[];
  overrides?: ConfigOverrides;
}

export interface PlannerDeps {
  terminal: Terminal;
  env: NodeJS.ProcessEnv;
  /** Where project.context.json is read and the artifacts are written */
  cwd: string;
  createClient?: (config: PlannerConfig) => ModelClient;
}

/**
 * Give a failure from a stage its stage code. Errors that already carry a
 * planner-level code (empty spec, write failure) pass through unchanged.
 */
function toStageError(code: ErrorCode, err: unknown): AppError {
  if (isAppError(err) && err.code !== ErrorCodes.AGENT_INVOKE_FAILED) return err;
  return new AppError(
    code,
    getErrorMessage(err),
    { cause: isAppError(err) ? err.code : undefined },
    isAppError(err) ? err.hints : []
  );
}

function requirementSuffix(spec: string): string {
  const count = parseExecutionSpec(spec).requirements.length;
  if (count === 0) return "";
  return ` (${count} requirement${count === 1 ? "" : "s"})`;
}

/**
 * One full planner run: configuration, feature naming, context, the conversation,
 * then synthesis and artifact writing. Returns the process exit status.
 */
export async function runPlanner(request: PlannerRequest, deps: PlannerDeps): Promise<number> {
  const { terminal, env, cwd } = deps;
  terminal.heading(WELCOME_MESSAGE);

  let config: PlannerConfig;
  try {
    config = loadConfig(env, request.overrides);
  } catch (err) {
    return reportFatalError(terminal, "Error", err);
  }
  setLogLevel(config.logLevel);

  const idea = request.ideaParts.join(" ").trim();
  if (!idea) {
    return reportFatalError(
      terminal,
      "Error",
      new AppError(ErrorCodes.IDEA_MISSING, "Please provide an initial feature idea.", undefined, [
        'Usage: plan "Add a password reset flow"',
      ])
    );
  }

  const client = (deps.createClient ?? createModelClient)(config);
  log.info("Planner started", { agent: config.agent.type, model: config.agent.model });

  let featureName: string;
  try {
    featureName = await withSpinner(terminal, "Naming your feature...", () =>
      generateFeatureName(client, idea)
    );
  } catch (err) {
    log.warn("Feature naming failed, using the idea", { err: getErrorMessage(err) });
    terminal.notice(`Could not generate a feature name (${getErrorMessage(err)}). Using your idea instead.`);
    featureName = idea;
  }
  terminal.labeled("Generated Feature Name", featureName);
  terminal.labeled("Planning feature", idea);

  const context = await loadProjectContext(cwd, (error) => {
    terminal.error(
      "Error",
      `Found '${PLANNER_PATHS.projectContext}' but couldn't read it: ${error.message}`
    );
  });
  if (context.message) terminal.info(context.message);

  const session = new ChatSession(client, buildSystemPrompt(context.contextJson));
  try {
    const reply = await withSpinner(terminal, "Thinking...", () => session.start(idea));
    terminal.agent(reply);
  } catch (err) {
    return reportFatalError(
      terminal,
      "Error starting chat",
      toStageError(ErrorCodes.CHAT_INIT_FAILED, err)
    );
  }
  terminal.notice(FINISH_HINT);

  try {
    const reason = await runConversationLoop(session, terminal);
    log.info("Conversation ended", { reason, turns: session.history.length });
  } catch (err) {
    return reportFatalError(
      terminal,
      "Error during conversation",
      toStageError(ErrorCodes.CONVERSATION_FAILED, err)
    );
  }

  const { synthesis, writer } = createPlannerServices(client, cwd);
  const baseName = sanitizeFilename(featureName);
  const input = {
    contextJson: context.contextJson,
    history: formatHistoryForPrompt(session.history),
  };

  try {
    const plan = await withSpinner(terminal, "Generating feature plan...", () =>
      synthesis.generatePlan(input)
    );
    const planFile = await writer.writePlan(baseName, plan);
    terminal.success(`Created: ./${planFile.filename}`);

    const spec = await withSpinner(terminal, "Generating execution spec...", () =>
      synthesis.generateSpec(input)
    );
    const specFile = await writer.writeSpec(baseName, spec);
    terminal.success(`Created: ./${specFile.filename}${requirementSuffix(spec)}`);

    const instructions = await writer.writeAgentInstructions();
    if (instructions.status === "created") {
      terminal.success(`Created: ./${instructions.filename}`);
    } else {
      terminal.skipped(`Found: ./${instructions.filename} (already exists, skipping)`);
    }
  } catch (err) {
    const error = toStageError(ErrorCodes.SYNTHESIS_FAILED, err);
    return reportFatalError(
      terminal,
      error.code === ErrorCodes.SPEC_EMPTY ? "Error" : "Error during synthesis",
      error
    );
  }

  terminal.heading("All artifacts generated.");
  return EXIT_SUCCESS;
}

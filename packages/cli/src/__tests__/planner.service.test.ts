import fs from "fs/promises";
import path from "path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { executionSpecToMarkdown } from "@feature-planner/shared";
import type { PlannerConfig } from "../config.js";
import { AGENT_INSTRUCTIONS_CONTENT, ARCHITECT_ACKNOWLEDGMENT } from "../prompts/index.js";
import { runPlanner, WELCOME_MESSAGE, FINISH_HINT } from "../services/planner.service.js";
import { KEYWORD_END_MESSAGE, INTERRUPTED_END_MESSAGE } from "../services/conversation.service.js";
import { setLogLevel } from "../utils/logger.js";
import { FakeModelClient, type FakeModelHandlers } from "./helpers/fake-model-client.js";
import { FakeTerminal } from "./helpers/fake-terminal.js";
import { makeTempDir, removeTempDir } from "./helpers/temp-dir.js";

const SPEC_MD = executionSpecToMarkdown({
  featureName: "Password Reset",
  requirements: [
    {
      id: "REQ-001",
      type: "USER_STORY",
      text: "WHEN the user clicks 'Forgot Password', THE SYSTEM SHALL show the reset form.",
    },
    { id: "REQ-002", type: "SECURITY", text: "THE SYSTEM SHALL expire reset links after one hour." },
  ],
});

const ENV = { OPENAI_API_KEY: "test-secret", LOG_LEVEL: "silent" };

function isNamingPrompt(prompt: string): boolean {
  return prompt.startsWith("You are a naming expert");
}

function isSpecPrompt(prompt: string): boolean {
  return prompt.includes('machine-readable "Execution Spec"');
}

/** Naming, plan and spec answers for a successful run; individual tests override pieces. */
function generateHandler(overrides: { name?: string; plan?: string; spec?: string } = {}) {
  return (prompt: string): string => {
    if (isNamingPrompt(prompt)) return overrides.name ?? "  Password Reset \n";
    if (isSpecPrompt(prompt)) return overrides.spec ?? SPEC_MD;
    return overrides.plan ?? "# Password Reset Plan\n";
  };
}

describe("runPlanner", () => {
  let dir: string;

  beforeEach(async () => {
    setLogLevel("silent");
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  function setup(inputs: Array<string | null>, handlers: FakeModelHandlers = {}) {
    const client = new FakeModelClient({
      chat: () => "Tell me more.",
      generate: generateHandler(),
      ...handlers,
    });
    const terminal = new FakeTerminal(inputs);
    const createClient = vi.fn((_config: PlannerConfig) => client);
    return { client, terminal, createClient };
  }

  const read = (filename: string) => fs.readFile(path.join(dir, filename), "utf-8");

  it("runs the conversation and writes all three artifacts", async () => {
    const { client, terminal, createClient } = setup(["Reset by email link", "done"]);

    const code = await runPlanner(
      { ideaParts: ["Add", "password", "reset"] },
      { terminal, env: ENV, cwd: dir, createClient }
    );

    expect(code).toBe(0);
    expect(terminal.lines).toEqual([
      `heading: ${WELCOME_MESSAGE}`,
      "labeled: Generated Feature Name: Password Reset",
      "labeled: Planning feature: Add password reset",
      "info: Starting a new greenfield plan.",
      "agent: Tell me more.",
      `notice: ${FINISH_HINT}`,
      "agent: Tell me more.",
      `heading: ${KEYWORD_END_MESSAGE}`,
      "success: Created: ./password_reset.plan.md",
      "success: Created: ./password_reset.spec.md (2 requirements)",
      "success: Created: ./AGENT_INSTRUCTIONS.md",
      "heading: All artifacts generated.",
    ]);
    expect(await read("password_reset.plan.md")).toBe("# Password Reset Plan\n");
    expect(await read("password_reset.spec.md")).toBe(SPEC_MD);
    expect(await read("AGENT_INSTRUCTIONS.md")).toBe(AGENT_INSTRUCTIONS_CONTENT);
    expect(createClient).toHaveBeenCalledWith({
      agent: { type: "openai", model: "gpt-4o-mini" },
      apiKey: "test-secret",
      logLevel: "silent",
    });
    expect(client.chatCalls).toHaveLength(2);
    expect(terminal.activeSpinners).toBe(0);
  });

  it("feeds the history without the system prompt into both synthesis prompts", async () => {
    const { client, terminal, createClient } = setup(["Reset by email link", "exit"]);

    await runPlanner({ ideaParts: ["Add password reset"] }, { terminal, env: ENV, cwd: dir, createClient });

    const [, planPrompt, specPrompt] = client.generateCalls;
    expect(planPrompt).toContain(
      `Here is our conversation history:\n[Assistant]: ${ARCHITECT_ACKNOWLEDGMENT}\n` +
        '[User]: My initial idea is: "Add password reset". Let\'s start from there.\n' +
        "[Assistant]: Tell me more.\n[User]: Reset by email link\n[Assistant]: Tell me more.\n"
    );
    expect(planPrompt).not.toContain('You are the "Product Architect"');
    expect(specPrompt).not.toContain('You are the "Product Architect"');
    expect(specPrompt).toContain("[User]: Reset by email link");
    expect(client.generateCalls).toHaveLength(3);
  });

  it("skips existing agent instructions", async () => {
    await fs.writeFile(path.join(dir, "AGENT_INSTRUCTIONS.md"), "custom rules", "utf-8");
    const { terminal, createClient } = setup(["q"]);

    const code = await runPlanner({ ideaParts: ["Add SSO"] }, { terminal, env: ENV, cwd: dir, createClient });

    expect(code).toBe(0);
    expect(terminal.lines).toContain(
      "skipped: Found: ./AGENT_INSTRUCTIONS.md (already exists, skipping)"
    );
    expect(await read("AGENT_INSTRUCTIONS.md")).toBe("custom rules");
  });

  it("summarizes project context and embeds it in the prompts", async () => {
    const payload = { product: { name: "Acme" }, engineering: { stack: ["React", "Node"] } };
    await fs.writeFile(path.join(dir, "project.context.json"), JSON.stringify(payload), "utf-8");
    const { client, terminal, createClient } = setup(["done"]);

    await runPlanner({ ideaParts: ["Add SSO"] }, { terminal, env: ENV, cwd: dir, createClient });

    expect(terminal.lines).toContain(
      "info: Context loaded from ./project.context.json. I see we're working on 'Acme' with a React, Node stack."
    );
    expect(client.chatCalls[0]?.[0]?.content).toContain(JSON.stringify(payload, null, 2));
    expect(client.generateCalls[1]).toContain(JSON.stringify(payload, null, 2));
  });

  it("reports an unreadable context file and carries on", async () => {
    await fs.writeFile(path.join(dir, "project.context.json"), "[]", "utf-8");
    const { terminal, createClient } = setup(["done"]);

    const code = await runPlanner({ ideaParts: ["Add SSO"] }, { terminal, env: ENV, cwd: dir, createClient });

    expect(code).toBe(0);
    expect(terminal.lines[3]).toBe(
      "error: Error: Found 'project.context.json' but couldn't read it: expected a JSON object at the top level"
    );
    expect(terminal.lines[4]).toBe("agent: Tell me more.");
  });

  it("synthesizes after end of input", async () => {
    const { terminal, createClient } = setup([]);

    const code = await runPlanner({ ideaParts: ["Add SSO"] }, { terminal, env: ENV, cwd: dir, createClient });

    expect(code).toBe(0);
    expect(terminal.lines).toContain(`heading: ${INTERRUPTED_END_MESSAGE}`);
    expect(await read("password_reset.plan.md")).toBe("# Password Reset Plan\n");
  });

  it("falls back to the idea when naming fails", async () => {
    const { terminal, createClient } = setup(["done"], {
      generate: (prompt) => {
        if (isNamingPrompt(prompt)) throw new Error("quota");
        return generateHandler()(prompt);
      },
    });

    const code = await runPlanner(
      { ideaParts: ["Add", "SSO", "login"] },
      { terminal, env: ENV, cwd: dir, createClient }
    );

    expect(code).toBe(0);
    expect(terminal.lines.slice(1, 3)).toEqual([
      "notice: Could not generate a feature name (quota). Using your idea instead.",
      "labeled: Generated Feature Name: Add SSO login",
    ]);
    expect(await read("add_sso_login.plan.md")).toBe("# Password Reset Plan\n");
  });

  it("uses the fallback base name when the name has no usable characters", async () => {
    const { terminal, createClient } = setup(["done"], { generate: generateHandler({ name: "!!!" }) });

    await runPlanner({ ideaParts: ["Add SSO"] }, { terminal, env: ENV, cwd: dir, createClient });

    expect(terminal.lines).toContain("success: Created: ./feature_plan.plan.md");
  });

  it("fails on an empty spec without writing it", async () => {
    const { terminal, createClient } = setup(["done"], { generate: generateHandler({ spec: " \n " }) });

    const code = await runPlanner({ ideaParts: ["Add SSO"] }, { terminal, env: ENV, cwd: dir, createClient });

    expect(code).toBe(1);
    expect(terminal.lines.slice(-2)).toEqual([
      "success: Created: ./password_reset.plan.md",
      "error: Error: The model did not generate any content for the spec file.",
    ]);
    expect(await fs.readdir(dir)).toEqual(["password_reset.plan.md"]);
  });

  it("fails when plan generation fails", async () => {
    const { terminal, createClient } = setup(["done"], {
      generate: (prompt) => {
        if (isNamingPrompt(prompt)) return "SSO";
        throw new Error("socket hang up");
      },
    });

    const code = await runPlanner({ ideaParts: ["Add SSO"] }, { terminal, env: ENV, cwd: dir, createClient });

    expect(code).toBe(1);
    expect(terminal.lines[terminal.lines.length - 1]).toBe("error: Error during synthesis: socket hang up");
    expect(await fs.readdir(dir)).toEqual([]);
  });

  it("fails when the opening message cannot be sent", async () => {
    const { terminal, createClient } = setup(["done"], {
      chat: () => {
        throw new Error("network down");
      },
    });

    const code = await runPlanner({ ideaParts: ["Add SSO"] }, { terminal, env: ENV, cwd: dir, createClient });

    expect(code).toBe(1);
    expect(terminal.lines[terminal.lines.length - 1]).toBe("error: Error starting chat: network down");
    expect(terminal.prompts).toEqual([]);
    expect(await fs.readdir(dir)).toEqual([]);
  });

  it("fails when a later turn fails, without writing files", async () => {
    const { terminal, createClient } = setup(["Reset by email link", "done"], {
      chat: (_messages, index) => {
        if (index > 0) throw new Error("rate limited");
        return "Tell me more.";
      },
    });

    const code = await runPlanner({ ideaParts: ["Add SSO"] }, { terminal, env: ENV, cwd: dir, createClient });

    expect(code).toBe(1);
    expect(terminal.lines[terminal.lines.length - 1]).toBe(
      "error: Error during conversation: rate limited"
    );
    expect(await fs.readdir(dir)).toEqual([]);
  });

  it("stops before creating a client when the key is missing", async () => {
    const { terminal, createClient } = setup(["done"]);

    const code = await runPlanner({ ideaParts: ["Add SSO"] }, { terminal, env: {}, cwd: dir, createClient });

    expect(code).toBe(1);
    expect(createClient).not.toHaveBeenCalled();
    expect(terminal.lines).toEqual([
      `heading: ${WELCOME_MESSAGE}`,
      "error: Error: `OPENAI_API_KEY` not found.",
      "info: Please create a `.env` file and add your API key.",
      'info: Example: `OPENAI_API_KEY="your_api_key_here"`',
    ]);
  });

  it("stops when no idea is given", async () => {
    const { terminal, createClient } = setup(["done"]);

    const code = await runPlanner({ ideaParts: ["  "] }, { terminal, env: ENV, cwd: dir, createClient });

    expect(code).toBe(1);
    expect(createClient).not.toHaveBeenCalled();
    expect(terminal.lines.slice(1)).toEqual([
      "error: Error: Please provide an initial feature idea.",
      'info: Usage: plan "Add a password reset flow"',
    ]);
  });

  it("stops on an invalid provider override", async () => {
    const { terminal, createClient } = setup(["done"]);

    const code = await runPlanner(
      { ideaParts: ["Add SSO"], overrides: { provider: "gemini" } },
      { terminal, env: ENV, cwd: dir, createClient }
    );

    expect(code).toBe(1);
    expect(createClient).not.toHaveBeenCalled();
    expect(terminal.lines[1]?.startsWith("error: Error: Invalid PLANNER_PROVIDER: ")).toBe(true);
  });
});

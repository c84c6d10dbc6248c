import { describe, it, expect } from "vitest";
import { sanitizeFilename, getPlanFilename, getSpecFilename } from "../filename.js";

describe("sanitizeFilename", () => {
  it("lowercases and converts spaces and hyphens to underscores", () => {
    expect(sanitizeFilename("My Cool-Feature!")).toBe("my_cool_feature");
  });

  it("falls back to feature_plan for empty input", () => {
    expect(sanitizeFilename("")).toBe("feature_plan");
  });

  it("falls back to feature_plan when nothing survives sanitation", () => {
    expect(sanitizeFilename("!!! ???")).toBe("feature_plan");
  });

  it("strips leading and trailing underscores", () => {
    expect(sanitizeFilename("  -Password Reset- ")).toBe("password_reset");
  });

  it("keeps one underscore per whitespace or hyphen character", () => {
    expect(sanitizeFilename("auth - reset")).toBe("auth___reset");
  });

  it("drops quotes and punctuation from model-suggested names", () => {
    expect(sanitizeFilename('"Auth: Forgot Password"')).toBe("auth_forgot_password");
  });
});

describe("artifact filenames", () => {
  it("derives plan and spec filenames from the base name", () => {
    expect(getPlanFilename("password_reset")).toBe("password_reset.plan.md");
    expect(getSpecFilename("password_reset")).toBe("password_reset.spec.md");
  });
});

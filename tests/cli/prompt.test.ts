import { describe, it, expect } from "vitest";
import { createScriptedPrompter, parseYesNo } from "../../src/cli/prompt.js";

describe("parseYesNo", () => {
  it("takes the default on an empty reply", () => {
    expect(parseYesNo("", true)).toBe(true);
    expect(parseYesNo("  ", false)).toBe(false);
  });

  it("accepts y and yes in any case", () => {
    expect(parseYesNo("Y", false)).toBe(true);
    expect(parseYesNo("yes", false)).toBe(true);
    expect(parseYesNo("YES ", false)).toBe(true);
  });

  it("treats anything else as no", () => {
    expect(parseYesNo("no", true)).toBe(false);
    expect(parseYesNo("yep", true)).toBe(false);
  });
});

describe("createScriptedPrompter", () => {
  it("answers from the script and falls back to defaults", async () => {
    const prompter = createScriptedPrompter({
      confirm: { "Proceed?": true },
      ask: { "New username": "agent1" },
    });

    expect(await prompter.confirm("Proceed?", false)).toBe(true);
    expect(await prompter.confirm("Create links?", true)).toBe(true);
    expect(await prompter.confirm("Continue anyway?", false)).toBe(false);
    expect(await prompter.ask("New username", "host")).toBe("agent1");
    expect(await prompter.ask("Current username", "bot")).toBe("bot");
    expect(await prompter.ask("Anything")).toBe("");
    expect(prompter.asked).toEqual([
      "Proceed?",
      "Create links?",
      "Continue anyway?",
      "New username",
      "Current username",
      "Anything",
    ]);
  });
});

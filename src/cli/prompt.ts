/**
 * Prompter implementations: readline for operators at a terminal, and a
 * scripted one that answers from a table (or with each default).
 */

import readline from "node:readline";
import type { Prompter } from "../types.js";

function question(text: string): Promise<string> {
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
  });
  return new Promise((resolve) => {
    rl.question(text, (answer) => {
      rl.close();
      resolve(answer.trim());
    });
  });
}

/** Interpret a yes/no reply; empty takes the default. */
export function parseYesNo(answer: string, defaultYes: boolean): boolean {
  const a = answer.trim().toLowerCase();
  if (!a) return defaultYes;
  return a === "y" || a === "yes";
}

export function createReadlinePrompter(): Prompter {
  return {
    async confirm(text, defaultYes) {
      const hint = defaultYes ? "[Y/n]" : "[y/N]";
      return parseYesNo(await question(`${text} ${hint} `), defaultYes);
    },
    async ask(text, defaultValue) {
      const answer = await question(defaultValue ? `${text} [${defaultValue}]: ` : `${text}: `);
      return answer || defaultValue || "";
    },
  };
}

export interface PromptScript {
  confirm?: Record<string, boolean>;
  ask?: Record<string, string>;
}

export interface ScriptedPrompter extends Prompter {
  /** Every question asked, in order. */
  readonly asked: readonly string[];
}

export function createScriptedPrompter(script: PromptScript = {}): ScriptedPrompter {
  const asked: string[] = [];
  return {
    asked,
    async confirm(text, defaultYes) {
      asked.push(text);
      return script.confirm?.[text] ?? defaultYes;
    },
    async ask(text, defaultValue) {
      asked.push(text);
      return script.ask?.[text] ?? defaultValue ?? "";
    },
  };
}

/**
 * Interactive menu loop
 * Prompts for a conversion, runs it, and prompts again until the user exits
 */

import type { ConversionMode } from "../types";

export type MenuChoice =
  | { kind: "exit" }
  | { kind: "convert"; mode: ConversionMode };

export type Ask = (question: string) => Promise<string>;

/**
 * The part of a readline/promises interface the menu needs
 */
export interface PromptInterface {
  question(query: string): Promise<string>;
  once(event: "close", listener: () => void): unknown;
}

export const MENU = [
  "",
  "1: lang => json",
  "2: json => lang",
  "3: convert all",
  "0: exit",
].join("\n");

export const PROMPT = "Select an option: ";

export const USAGE =
  "Invalid choice. Enter 0 (exit), 1 (lang => json), 2 (json => lang) or 3 (convert all).";

const MODES: Record<number, ConversionMode> = {
  1: "lang-to-json",
  2: "json-to-lang",
  3: "both",
};

/**
 * Parse a menu answer; surrounding whitespace, a leading "+" and leading
 * zeros are accepted ("03" selects 3)
 *
 * @returns null for anything that is not a menu option
 */
export function parseMenuChoice(answer: string): MenuChoice | null {
  const trimmed = answer.trim();
  if (!/^\+?\d+$/.test(trimmed)) return null;

  const option = Number(trimmed);
  if (option === 0) return { kind: "exit" };

  const mode = MODES[option];
  return mode ? { kind: "convert", mode } : null;
}

/**
 * Wrap a prompt interface so that closing its input (Ctrl+D) answers "0"
 *
 * A question pending at close time may either stay pending or be rejected
 * with an AbortError, depending on the Node.js release; both resolve to "0".
 */
export function createAsk(rl: PromptInterface): Ask {
  let closed = false;
  const onClose = new Promise<string>((resolve) => {
    rl.once("close", () => {
      closed = true;
      resolve("0");
    });
  });

  return (question) => {
    if (closed) return onClose;

    const answer = rl.question(question).catch((error: unknown) => {
      if (closed || (error instanceof Error && error.name === "AbortError")) {
        return "0";
      }
      throw error;
    });

    return Promise.race([onClose, answer]);
  };
}

/**
 * Run the menu until the user chooses to exit
 */
export async function runMenu(
  ask: Ask,
  onConvert: (mode: ConversionMode) => Promise<void>,
  print: (message: string) => void = console.log,
): Promise<void> {
  for (;;) {
    print(MENU);
    const choice = parseMenuChoice(await ask(PROMPT));

    if (!choice) {
      print(USAGE);
      continue;
    }
    if (choice.kind === "exit") return;

    await onConvert(choice.mode);
  }
}

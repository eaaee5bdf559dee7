import readline from "node:readline";
import pc from "picocolors";
import type { Profile } from "../types.js";

export function isTerminalInteractive(): boolean {
  return Boolean(process.stdin.isTTY && process.stdout.isTTY);
}

function ask(rl: readline.Interface, question: string): Promise<string | null> {
  return new Promise((resolve) => {
    const onClose = () => resolve(null);
    rl.once("close", onClose);
    rl.question(question, (answer) => {
      rl.off("close", onClose);
      resolve(answer);
    });
  });
}

/**
 * Numbered menu on stdin/stdout. Resolves with the chosen index, or null when
 * the terminal is not interactive or input ends before a valid answer.
 */
export async function promptSelect(question: string, choices: string[], defaultIndex = 0): Promise<number | null> {
  if (!isTerminalInteractive() || choices.length === 0) return null;
  const rl = readline.createInterface({ input: process.stdin, output: process.stdout, terminal: true });
  try {
    process.stdout.write(`${pc.bold(question)}\n`);
    choices.forEach((choice, index) => {
      const marker = index === defaultIndex ? pc.green("*") : " ";
      process.stdout.write(` ${marker} ${index + 1}. ${choice}\n`);
    });
    for (;;) {
      const reply = await ask(rl, `Enter your choice (1-${choices.length}) [${defaultIndex + 1}]: `);
      if (reply === null) return null;
      const answer = reply.trim();
      if (!answer) return defaultIndex;
      const picked = Number(answer);
      if (Number.isInteger(picked) && picked >= 1 && picked <= choices.length) {
        return picked - 1;
      }
      process.stdout.write(`${pc.red(`Invalid choice. Enter a number from 1 to ${choices.length}.`)}\n`);
    }
  } finally {
    rl.close();
  }
}

export async function promptProfile(profiles: Profile[], defaultId: string): Promise<Profile | null> {
  const defaultIndex = Math.max(
    0,
    profiles.findIndex((profile) => profile.id === defaultId)
  );
  const choices = profiles.map((profile) => `${profile.name} (${profile.groups.join(", ")})`);
  const selected = await promptSelect("Select profile:", choices, defaultIndex);
  return selected === null ? null : profiles[selected] ?? null;
}

import readline from "readline/promises";
import { parseISODateToken } from "@/lib/input-engine";

export type Ask = (question: string) => Promise<string>;

export type Horizon = {
  startDate: string;
  numWeeks: number;
};

export function interpretStartDate(answer: string, fallback: string): string {
  const trimmed = answer.trim();
  if (!trimmed) return fallback;
  if (!parseISODateToken(trimmed)) {
    console.log(`Invalid date "${trimmed}", using ${fallback}`);
    return fallback;
  }
  return trimmed;
}

export function interpretNumWeeks(answer: string, fallback: number): number {
  const trimmed = answer.trim();
  if (!trimmed) return fallback;
  if (!/^\d+$/.test(trimmed)) {
    console.log(`Invalid number of weeks "${trimmed}", using ${fallback}`);
    return fallback;
  }
  return Number(trimmed);
}

export async function promptHorizon(defaults: Horizon, ask: Ask): Promise<Horizon> {
  const startDate = interpretStartDate(await ask(`Start date (YYYY-MM-DD) [${defaults.startDate}]: `), defaults.startDate);
  const numWeeks = interpretNumWeeks(await ask(`Number of weeks [${defaults.numWeeks}]: `), defaults.numWeeks);
  return { startDate, numWeeks };
}

export async function promptHorizonOnTerminal(defaults: Horizon): Promise<Horizon> {
  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
  try {
    return await promptHorizon(defaults, (q) => rl.question(q));
  } finally {
    rl.close();
  }
}

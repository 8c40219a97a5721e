import readline, { type Interface } from "node:readline/promises";
import { stdin as input, stdout as output } from "node:process";

/** Asks on the given interface, or on a short-lived one over stdin/stdout. */
export async function askYesNo(prompt: string, defaultNo = true, rl?: Interface): Promise<boolean> {
  const iface = rl ?? readline.createInterface({ input, output });
  try {
    const suffix = defaultNo ? " (y/N): " : " (Y/n): ";
    const raw = (await iface.question(`${prompt}${suffix}`)).trim().toLowerCase();
    if (!raw) return !defaultNo;
    return raw === "y" || raw === "yes";
  } finally {
    if (!rl) iface.close();
  }
}

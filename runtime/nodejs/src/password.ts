import type { GeneratePolicy } from "@apphost/sdk";
import { randomInt } from "crypto";
import { AppHostError } from "./types.js";

const LOWER = "abcdefghijklmnopqrstuvwxyz";
const UPPER = "ABCDEFGHIJKLMNOPQRSTUVWXYZ";
const NUMERIC = "0123456789";
const SPECIAL = "-_.~()*+!?";

export const DEFAULT_GENERATE_POLICY: GeneratePolicy = {
  minLength: 22,
  lower: true,
  upper: true,
  numeric: true,
  special: true,
};

export function generatePolicy(overrides: Partial<GeneratePolicy> = {}): GeneratePolicy {
  return { ...DEFAULT_GENERATE_POLICY, ...overrides };
}

/**
 * Generates a random value with at least one character from every enabled
 * class.
 */
export function generatePassword(policy: GeneratePolicy): string {
  const classes = [
    policy.lower ? LOWER : "",
    policy.upper ? UPPER : "",
    policy.numeric ? NUMERIC : "",
    policy.special ? SPECIAL : "",
  ].filter((chars) => chars.length > 0);

  if (classes.length === 0) {
    throw new AppHostError(
      "ERR_INVALID_DEFINITION",
      "Generate policy disables every character class",
      { field: "generate" },
    );
  }

  const all = classes.join("");
  const chars = classes.map(pick);
  while (chars.length < policy.minLength) {
    chars.push(pick(all));
  }

  for (let i = chars.length - 1; i > 0; i -= 1) {
    const j = randomInt(i + 1);
    [chars[i], chars[j]] = [chars[j], chars[i]];
  }
  return chars.join("");
}

function pick(chars: string): string {
  return chars.charAt(randomInt(chars.length));
}

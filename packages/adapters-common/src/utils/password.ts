import { randomInt } from "node:crypto";
import { ValidationError } from "../errors/errors";

export type CharacterClass = "lower" | "upper" | "digit" | "symbol";

export const CHARACTER_CLASSES: readonly CharacterClass[] = ["lower", "upper", "digit", "symbol"];

/** Shortest password the generator will produce. */
export const MIN_PASSWORD_LENGTH = 16;

export const DEFAULT_PASSWORD_LENGTH = 24;

/**
 * Symbols that survive JDBC URLs, shell quoting and Airflow variable
 * templating without escaping.
 */
export const DEFAULT_SYMBOLS = "!#%+-=?@^_";

const ALPHABETS: Record<Exclude<CharacterClass, "symbol">, string> = {
  lower: "abcdefghijklmnopqrstuvwxyz",
  upper: "ABCDEFGHIJKLMNOPQRSTUVWXYZ",
  digit: "0123456789",
};

export interface PasswordPolicy {
  length: number;
  /** Every listed class contributes at least one character */
  classes: CharacterClass[];
  /** Alphabet used for the "symbol" class */
  symbols: string;
}

export const DEFAULT_PASSWORD_POLICY: PasswordPolicy = {
  length: DEFAULT_PASSWORD_LENGTH,
  classes: [...CHARACTER_CLASSES],
  symbols: DEFAULT_SYMBOLS,
};

/** Source of uniform random integers in [0, max). */
export type RandomIndex = (max: number) => number;

function alphabetFor(characterClass: CharacterClass, policy: PasswordPolicy): string {
  return characterClass === "symbol" ? policy.symbols : ALPHABETS[characterClass];
}

/**
 * Parse a comma-separated class list such as "lower,upper,digit".
 */
export function parseCharacterClasses(value: string): CharacterClass[] {
  const classes: CharacterClass[] = [];
  for (const raw of value.split(",")) {
    const name = raw.trim().toLowerCase();
    if (!name) continue;
    const match = CHARACTER_CLASSES.find((c) => c === name);
    if (!match) {
      throw new ValidationError(
        `Unknown character class "${raw.trim()}" (expected one of: ${CHARACTER_CLASSES.join(", ")})`
      );
    }
    if (!classes.includes(match)) {
      classes.push(match);
    }
  }
  return classes;
}

/**
 * Reject policies the generator cannot satisfy.
 */
export function validatePasswordPolicy(policy: PasswordPolicy): void {
  if (!Number.isInteger(policy.length) || policy.length < MIN_PASSWORD_LENGTH) {
    throw new ValidationError(
      `Password length must be an integer of at least ${MIN_PASSWORD_LENGTH} (got ${policy.length})`
    );
  }
  if (policy.classes.length === 0) {
    throw new ValidationError("Password policy must include at least one character class");
  }
  if (policy.classes.includes("symbol") && policy.symbols.length === 0) {
    throw new ValidationError("Password policy includes symbols but the symbol alphabet is empty");
  }
}

/**
 * Check a candidate against a policy.
 * @returns The classes the value is missing (empty when compliant)
 */
export function missingCharacterClasses(value: string, policy: PasswordPolicy): CharacterClass[] {
  return policy.classes.filter((characterClass) => {
    const alphabet = alphabetFor(characterClass, policy);
    return ![...value].some((ch) => alphabet.includes(ch));
  });
}

/**
 * Generate a random password satisfying the policy.
 *
 * One character is drawn from each required class, the rest from the union
 * of all classes, then the result is shuffled (Fisher-Yates) so the
 * guaranteed characters don't sit at fixed positions.
 */
export function generatePassword(
  policy: PasswordPolicy = DEFAULT_PASSWORD_POLICY,
  random: RandomIndex = randomInt
): string {
  validatePasswordPolicy(policy);

  const pool = policy.classes.map((c) => alphabetFor(c, policy)).join("");
  const chars: string[] = policy.classes.map((c) => {
    const alphabet = alphabetFor(c, policy);
    return alphabet[random(alphabet.length)];
  });

  while (chars.length < policy.length) {
    chars.push(pool[random(pool.length)]);
  }

  for (let i = chars.length - 1; i > 0; i--) {
    const j = random(i + 1);
    [chars[i], chars[j]] = [chars[j], chars[i]];
  }

  return chars.join("");
}

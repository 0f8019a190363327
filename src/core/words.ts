import { chance, randomBelow, randomRange, type RandomSource } from "./random.js";

export const ALPHANUMERIC = "0123456789abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ";

// Precomposed Hangul syllables, upper bound exclusive.
export const HANGUL_START = 0xac00;
export const HANGUL_END = 0xd7b0;

export type WordScript = "alphanumeric" | "hangul";

export interface Word {
  script: WordScript;
  text: string;
}

export interface WordOptions {
  minLength: number; // inclusive
  maxLength: number; // inclusive
  alphanumericProbability: number;
}

/**
 * Generate one word. The length is drawn first, then the script, then each
 * character independently from that script's set.
 */
export function randomWord(rng: RandomSource, options: WordOptions): Word {
  const length = randomRange(rng, options.minLength, options.maxLength + 1);
  let text = "";
  if (chance(rng, options.alphanumericProbability)) {
    for (let i = 0; i < length; i++) {
      text += ALPHANUMERIC.charAt(randomBelow(rng, ALPHANUMERIC.length));
    }
    return { script: "alphanumeric", text };
  }
  for (let i = 0; i < length; i++) {
    text += String.fromCharCode(randomRange(rng, HANGUL_START, HANGUL_END));
  }
  return { script: "hangul", text };
}

/**
 * Classify a string by the script every one of its characters belongs to.
 * Returns null for empty, mixed, or foreign text.
 */
export function wordScript(text: string): WordScript | null {
  if (/^[0-9a-zA-Z]+$/.test(text)) return "alphanumeric";
  if (/^[\uac00-\ud7af]+$/.test(text)) return "hangul";
  return null;
}

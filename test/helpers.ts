import type { OutputSink } from "../src/core/generator.js";
import type { RandomSource } from "../src/core/random.js";

/**
 * A RandomSource that replays fixed values, so a test can trace exactly
 * which draw produces which choice. Throws once the values run out.
 */
export function sequenceRandom(values: number[]): RandomSource & { remaining(): number } {
  let index = 0;
  return {
    next(): number {
      const value = values[index];
      if (value === undefined) {
        throw new Error(`sequenceRandom: exhausted after ${values.length} draws`);
      }
      index++;
      return value;
    },
    remaining: () => values.length - index,
  };
}

/**
 * In-memory sink that records every chunk.
 */
export function memorySink(): OutputSink & { chunks: string[]; text(): string } {
  const chunks: string[] = [];
  return {
    chunks,
    write: async (chunk) => {
      chunks.push(chunk);
    },
    text: () => chunks.join(""),
  };
}

export interface ParsedToken {
  style: string | undefined;
  word: string;
  reset: boolean;
  separator: string;
}

const TOKEN = /(\x1b\[\d+m)?([^\x1b \n]+)(\x1b\[0m)?([ \n])/y;

/**
 * Split generator output into tokens. Throws if anything other than tokens
 * and the final newline is present.
 */
export function parseOutput(output: string): ParsedToken[] {
  if (!output.endsWith("\n")) {
    throw new Error("output does not end with a newline");
  }
  const body = output.slice(0, -1);
  const tokens: ParsedToken[] = [];
  TOKEN.lastIndex = 0;
  while (TOKEN.lastIndex < body.length) {
    const start = TOKEN.lastIndex;
    const match = TOKEN.exec(body);
    if (!match) {
      throw new Error(`unparseable output at offset ${start}`);
    }
    tokens.push({
      style: match[1],
      word: match[2] ?? "",
      reset: match[3] !== undefined,
      separator: match[4] ?? "",
    });
  }
  return tokens;
}

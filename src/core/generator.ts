import { setTimeout as delay } from "node:timers/promises";
import type { Config } from "./config.js";
import { chance, type RandomSource } from "./random.js";
import { applyStyle, randomStyle } from "./styles.js";
import { randomWord, type Word } from "./words.js";

export type Separator = " " | "\n";

export interface Token {
  style: string; // "" when unstyled
  word: Word;
  separator: Separator;
}

/**
 * Destination for rendered tokens. `write` resolves once the chunk has been
 * handed off, and rejects if the write fails.
 */
export interface OutputSink {
  write(chunk: string): Promise<void>;
}

export interface GenerateOptions {
  rng: RandomSource;
  config: Config;
  sink: OutputSink;
  sleep?: (ms: number) => Promise<void>;
}

export interface GenerateSummary {
  tokens: number;
  lines: number; // newline separators, not counting the final newline
  styled: number;
}

/**
 * Adapt a Node writable stream (normally process.stdout) to an OutputSink.
 */
export function streamSink(stream: NodeJS.WritableStream): OutputSink {
  return {
    write: (chunk) =>
      new Promise<void>((resolve, reject) => {
        stream.write(chunk, (err) => {
          if (err) reject(err);
          else resolve();
        });
      }),
  };
}

/**
 * Lazily draw `config.word_count` tokens. Draw order per token is style,
 * word, separator; a given seed therefore always yields the same stream.
 */
export function* tokens(rng: RandomSource, config: Config): Generator<Token> {
  for (let i = 0; i < config.word_count; i++) {
    const style = randomStyle(rng, { probability: config.style_probability });
    const word = randomWord(rng, {
      minLength: config.min_length,
      maxLength: config.max_length,
      alphanumericProbability: config.alphanumeric_probability,
    });
    const separator: Separator = chance(rng, config.newline_probability) ? "\n" : " ";
    yield { style, word, separator };
  }
}

export function renderToken(token: Token): string {
  return applyStyle(token.style, token.word.text) + token.separator;
}

/**
 * Write every token to the sink, waiting for each write before drawing the
 * next. After a newline separator, pause for `config.pause_ms`. Ends with a
 * final newline.
 */
export async function generate(options: GenerateOptions): Promise<GenerateSummary> {
  const { rng, config, sink } = options;
  const sleep = options.sleep ?? ((ms: number) => delay(ms));
  const summary: GenerateSummary = { tokens: 0, lines: 0, styled: 0 };

  for (const token of tokens(rng, config)) {
    await sink.write(renderToken(token));
    summary.tokens++;
    if (token.style !== "") summary.styled++;
    if (token.separator === "\n") {
      summary.lines++;
      await sleep(config.pause_ms);
    }
  }

  await sink.write("\n");
  return summary;
}

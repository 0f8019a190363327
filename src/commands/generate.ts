import { defaultConfig, readConfig } from "../core/config.js";
import { generate, streamSink, type GenerateSummary } from "../core/generator.js";
import { createSeededRandom, systemRandom } from "../core/random.js";

const MAX_SEED = 0xffff_ffff;

export interface GenerateCommandOptions {
  seed?: number;
  configPath?: string;
  stdout?: NodeJS.WritableStream;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * `wordspray` — stream random words to stdout.
 * Without a seed the system random source is used; without a config path
 * the built-in defaults apply.
 */
export async function runGenerate(options: GenerateCommandOptions = {}): Promise<GenerateSummary> {
  if (options.seed !== undefined && !Number.isSafeInteger(options.seed)) {
    throw new Error(`Invalid seed: ${options.seed} (expected an integer)`);
  }
  // The seeded source keeps 32 bits of state; wider seeds would alias.
  if (options.seed !== undefined && (options.seed < 0 || options.seed > MAX_SEED)) {
    throw new Error(`Invalid seed: ${options.seed} (expected 0 to ${MAX_SEED})`);
  }

  const config =
    options.configPath !== undefined ? await readConfig(options.configPath) : defaultConfig();
  const rng = options.seed === undefined ? systemRandom : createSeededRandom(options.seed);

  return await generate({
    rng,
    config,
    sink: streamSink(options.stdout ?? process.stdout),
    sleep: options.sleep,
  });
}

import { chance, pick, randomRange, type RandomSource } from "./random.js";

const esc = (code: number) => `\x1b[${code}m`;

export const RESET = esc(0);

type StyleKind = () => string;

export interface StyleOptions {
  probability: number;
}

/**
 * The five style kinds, picked uniformly. Colour numbers are only drawn
 * when a colour kind is picked.
 */
export function styleKinds(rng: RandomSource): [StyleKind, ...StyleKind[]] {
  return [
    () => esc(1), // bold
    () => esc(2), // dim
    () => esc(3), // italic
    () => esc(randomRange(rng, 30, 38)),
    () => esc(randomRange(rng, 90, 98)),
  ];
}

/**
 * Return an SGR escape with the given probability, "" otherwise.
 */
export function randomStyle(rng: RandomSource, options: StyleOptions): string {
  if (!chance(rng, options.probability)) return "";
  return pick(rng, styleKinds(rng))();
}

/**
 * Wrap text in a style and a reset. Unstyled text is returned bare.
 */
export function applyStyle(style: string, text: string): string {
  return style === "" ? text : `${style}${text}${RESET}`;
}

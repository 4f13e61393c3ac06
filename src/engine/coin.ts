import type { RandomSource } from './random'

/** One biased coin flip: a win when the uniform draw is at most `p`. */
export function flipCoin(rng: RandomSource, p = 0.5): boolean {
  return rng.random() <= p
}

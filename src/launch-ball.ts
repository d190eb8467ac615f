import { chance, type RandomSource } from './rng';

/**
 * Decides whether a launched ball drops into the start hole. One draw per
 * launch; the ball is spent either way.
 */
export class LaunchBallFlowProducer {
  constructor(private readonly random: RandomSource) {}

  launch(startHoleProbability: number): boolean {
    return chance(startHoleProbability, this.random);
  }
}

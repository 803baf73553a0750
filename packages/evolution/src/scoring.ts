import { NoCandidatesError } from "@gauntlet/schemas";
import type { PromptCandidate } from "@gauntlet/schemas";

/** Smoothing factor of the per-candidate damage and rounds averages. */
export const EMA_ALPHA = 0.3;
/** Damage bonus ceiling added on top of the UCB1 score. */
export const MAX_DAMAGE_BONUS = 0.15;
const DAMAGE_BONUS_SCALE = 600;

export function evaluations(candidate: PromptCandidate): number {
  return candidate.wins + candidate.losses;
}

/** Observed win rate; an untried candidate counts as a coin flip. */
export function winRate(candidate: PromptCandidate): number {
  const total = evaluations(candidate);
  return total > 0 ? candidate.wins / total : 0.5;
}

export function totalEvaluations(pool: readonly PromptCandidate[]): number {
  return pool.reduce((sum, c) => sum + evaluations(c), 0);
}

/**
 * UCB1 with a small damage bonus. A candidate that was never played
 * scores +Infinity so it is tried before anything is exploited.
 */
export function candidateScore(candidate: PromptCandidate, totalEvals: number): number {
  const evals = evaluations(candidate);
  if (evals === 0) return Infinity;
  const explore = Math.sqrt((2 * Math.log(Math.max(1, totalEvals))) / evals);
  const damageBonus = Math.min(MAX_DAMAGE_BONUS, candidate.avg_damage / DAMAGE_BONUS_SCALE);
  return winRate(candidate) + explore + damageBonus;
}

/** Highest-scoring candidate; the earliest one wins a tie. */
export function selectActive(pool: readonly PromptCandidate[]): PromptCandidate {
  if (pool.length === 0) throw new NoCandidatesError();
  const total = totalEvaluations(pool);
  return pool.reduce((best, candidate) =>
    candidateScore(candidate, total) > candidateScore(best, total) ? candidate : best
  );
}

export function ema(previous: number, sample: number, alpha: number = EMA_ALPHA): number {
  return previous * (1 - alpha) + sample * alpha;
}

// Pure formatting for CLI output. Every function returns lines; printing is the caller's job.
import type {
  CredentialSummary,
  HeadToHead,
  JournalEvent,
  PromptCandidate,
  RecalledEpisode,
} from "@gauntlet/schemas";
import type { PolicyMemory } from "@gauntlet/memory";
import { candidateScore, totalEvaluations, winRate } from "@gauntlet/evolution";

// ANSI color helpers
export const dim = (s: string): string => `\x1b[2m${s}\x1b[0m`;
export const green = (s: string): string => `\x1b[32m${s}\x1b[0m`;
export const red = (s: string): string => `\x1b[31m${s}\x1b[0m`;
export const yellow = (s: string): string => `\x1b[33m${s}\x1b[0m`;

export const PREVIEW_LEN = 60;

export function truncate(s: string, max: number): string {
  const flat = s.replace(/\s+/g, " ").trim();
  return flat.length > max ? `${flat.slice(0, max - 3)}...` : flat;
}

function percent(fraction: number): string {
  return `${(fraction * 100).toFixed(1)}%`;
}

function usd(amount: number): string {
  return `$${amount.toFixed(4)}`;
}

function credentialState(c: CredentialSummary): string {
  if (!c.active) return red("inactive");
  if (c.cooldown_remaining_s > 0) return yellow(`cooling ${c.cooldown_remaining_s}s`);
  return c.available ? green("ready") : red("over budget");
}

export function formatCredentials(summary: CredentialSummary[], totalCostUsd: number): string[] {
  const lines = summary.map((c) =>
    `${c.alias.padEnd(10)} ${c.provider.padEnd(9)} ${credentialState(c)}  ` +
    `health ${c.health.toFixed(3)}  spent ${usd(c.cost_usd)}  left ${usd(c.budget_remaining_usd)}  ` +
    `tokens ${c.tokens_in}/${c.tokens_out}  errors ${c.errors_ratelimit}/${c.errors_server}`
  );
  lines.push(`Total cost: ${usd(totalCostUsd)}`);
  return lines;
}

export function formatPolicy(memory: PolicyMemory): string[] {
  const state = memory.snapshot();
  const lines = [
    `${state.name} (${state.agent_class}) [${state.agent_id}]`,
    `Record: ${state.wins}W ${state.losses}L (${percent(memory.winRate())})`,
    `Damage: dealt ${state.damage_dealt}, taken ${state.damage_taken}`,
  ];
  const preferred = memory.preferredActions();
  lines.push(`Preferred: ${preferred.length > 0 ? preferred.join(", ") : dim("none yet")}`);
  const bandit = memory.banditSummary();
  if (bandit) lines.push(bandit);
  const opponents = Object.keys(state.opponent_models).sort();
  for (const opponent of opponents) {
    const insight = memory.opponentInsight(opponent);
    if (insight) lines.push(`vs ${opponent}: ${insight}`);
  }
  return lines;
}

/** Candidates ranked by selection score, as the pool would pick them. */
export function formatCandidates(candidates: PromptCandidate[]): string[] {
  if (candidates.length === 0) return ["No prompt candidates."];
  const total = totalEvaluations(candidates);
  const ranked = candidates
    .map((c) => ({ candidate: c, score: candidateScore(c, total) }))
    .sort((a, b) => (a.score === b.score ? 0 : a.score > b.score ? -1 : 1));
  return ranked.map(({ candidate: c, score }) => {
    const shown = Number.isFinite(score) ? score.toFixed(3) : "untried";
    return `${c.prompt_id}  gen ${c.generation}  ${c.wins}W ${c.losses}L (${percent(winRate(c))})  ` +
      `score ${shown}  dmg ${c.avg_damage.toFixed(1)}  ${dim(truncate(c.text, PREVIEW_LEN))}`;
  });
}

export function formatRecall(episodes: RecalledEpisode[]): string[] {
  if (episodes.length === 0) return ["No similar episodes."];
  return episodes.map((e) =>
    `${e.similarity.toFixed(2)}  ${e.action} -> ${e.outcome.toFixed(2)}  ${truncate(e.situation, PREVIEW_LEN)}`
  );
}

export function formatHeadToHead(agentA: string, agentB: string, h2h: HeadToHead): string[] {
  if (h2h.total === 0) return [`${agentA} and ${agentB} have not met.`];
  return [
    `${agentA} vs ${agentB}: ${h2h.total} games`,
    `  ${agentA}: ${h2h.wins[agentA] ?? 0} wins`,
    `  ${agentB}: ${h2h.wins[agentB] ?? 0} wins`,
    `  draws: ${h2h.draws}`,
  ];
}

export function formatEvent(event: JournalEvent): string {
  const ts = event.timestamp.split("T")[1]?.slice(0, 12) ?? "";
  const payload = Object.keys(event.payload).length > 0 ? ` ${JSON.stringify(event.payload)}` : "";
  return `[${ts}] ${event.scope_id} ${event.type}${payload}`;
}

/** Variant blocks at or below this many trimmed characters are dropped. */
export const MIN_VARIANT_CHARS = 80;
/** Seed prompt characters shown to the rewriter. */
export const MAX_SEED_CHARS = 1200;
export const VARIANT_MAX_TOKENS = 2200;
export const VARIANT_TEMPERATURE = 0.93;

export const VARIANT_SYSTEM_PROMPT =
  "Return only the variant prompts in the requested format. No preamble.";

export interface VariantPromptInput {
  agentName: string;
  agentClass: string;
  seedText: string;
  seedWinRate: number;
  feedback: string;
  count: number;
}

export function buildVariantPrompt(input: VariantPromptInput): string {
  const { agentName, agentClass, count } = input;
  const winRate = `${(input.seedWinRate * 100).toFixed(1)}%`;
  return `You rewrite the system prompts that steer characters in a turn-based fantasy combat game.

## Current prompt for ${agentName} (${agentClass})
<CURRENT_PROMPT>
${input.seedText.slice(0, MAX_SEED_CHARS)}
</CURRENT_PROMPT>

## Performance
Win rate with this prompt: ${winRate}
Latest battle: ${input.feedback || "no summary recorded"}

## Task
Write ${count} new versions of the prompt. Every version must:
1. Keep the name ${agentName} and the class ${agentClass}.
2. Read like a person fighting for their life, not a game bot.
3. Take a different tactical emphasis or emotional stance from the current prompt.
4. Stay under 600 words.
5. Finish with the line: ACTION: <action_name>

## Output
Exactly ${count} blocks, nothing else:
<VARIANT>
...prompt...
</VARIANT>`;
}

/** Trimmed `<VARIANT>` bodies longer than the minimum, at most `count` of them. */
export function parseVariants(text: string, count: number): string[] {
  const bodies: string[] = [];
  for (const match of text.matchAll(/<VARIANT>([\s\S]*?)<\/VARIANT>/g)) {
    const body = (match[1] ?? "").trim();
    if (body.length > MIN_VARIANT_CHARS) bodies.push(body);
  }
  return bodies.slice(0, count);
}

import { ACTION_TYPES, isActionType } from "@gauntlet/schemas";
import type { ActionType } from "@gauntlet/schemas";

const NARRATION_MAX_CHARS = 450;

/**
 * Action named by the reply: the `ACTION: <word>` tag, else the first
 * action name mentioned anywhere, else `fallback()`.
 */
export function parseAction(text: string, fallback: () => ActionType): ActionType {
  const tagged = /ACTION:\s*(\w+)/i.exec(text);
  if (tagged) {
    const word = (tagged[1] ?? "").toLowerCase();
    if (isActionType(word)) return word;
  }
  const lower = text.toLowerCase();
  const mentioned = ACTION_TYPES.find((action) => lower.includes(action));
  return mentioned ?? fallback();
}

/** Reply text without action tags, whitespace collapsed and clipped. */
export function parseNarration(text: string, agentName: string): string {
  const cleaned = text.replace(/ACTION:\s*\w+/gi, "").replace(/\s+/g, " ").trim();
  return cleaned ? cleaned.slice(0, NARRATION_MAX_CHARS) : `${agentName} moves.`;
}

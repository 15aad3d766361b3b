// ── Patterns ──────────────────────────────────────────────────

const QUOTED_CLICK = /click(?:\s+on)?\s+(?:the\s+)?["']([^"']{1,120})["']/i;

const PLAIN_CLICK =
  /click(?:\s+on)?\s+(?:the\s+)?([a-zA-Z0-9][a-zA-Z0-9\s_\-:/&]{0,120}?)(?:\s+(?:button|link|tab|menu|option))?(?:[.!?]|$)/i;

const ACTION_LIKE = /click|open|go to|navigate|compare|buy|select|choose|learn more/i;

const HTTP_URL = /https?:\/\/\S+/i;

const BARE_DOMAIN = /\b([a-zA-Z0-9-]+\.[a-zA-Z]{2,})(\/\S*)?\b/;

const TRAILING_PUNCTUATION = /[.,)]$/;

// ── Public types ─────────────────────────────────────────────

export interface ComposedInstruction {
  /** Deterministic prompt for single-action and external-tool paths. */
  taskPrompt: string;
  /** Longer form for the engine's autonomous agent. */
  agentInstruction: string;
  /** UI label pulled from the instruction; `''` when none. */
  clickTarget: string;
}

// ── Heuristics ───────────────────────────────────────────────

/**
 * Pull a click target out of free text.
 *
 *   1. quoted phrase after "click" / "click on"   → `click "Sign up"`
 *   2. bare phrase up to an optional element noun → `click the Pricing tab.`
 *
 * The quoted form wins when both could match.
 */
export function extractClickTarget(text: string): string {
  const raw = text.trim();
  if (!raw) return '';

  const quoted = QUOTED_CLICK.exec(raw);
  if (quoted?.[1]) return quoted[1].trim();

  const plain = PLAIN_CLICK.exec(raw);
  if (plain?.[1]) return plain[1].trim();

  return '';
}

export function isActionLike(text: string): boolean {
  return ACTION_LIKE.test(text);
}

/** First absolute URL, else the first bare `name.tld` promoted to https. */
export function extractStartUrl(text: string): string {
  const absolute = HTTP_URL.exec(text);
  if (absolute) return absolute[0].replace(TRAILING_PUNCTUATION, '');

  const bare = BARE_DOMAIN.exec(text);
  if (!bare) return '';
  return `https://${bare[0].replace(TRAILING_PUNCTUATION, '')}`;
}

export function deriveStartUrl(instruction: string, context: string): string {
  return extractStartUrl(instruction) || extractStartUrl(context);
}

// ── Prompts ──────────────────────────────────────────────────

export function composeTaskPrompt(
  instruction: string,
  context: string,
  startUrl: string,
): string {
  const pieces = [`Primary instruction: ${instruction}`];
  if (context) pieces.push(`Context: ${context}`);
  if (startUrl) {
    pieces.push(`Required start URL: ${startUrl}`);
    pieces.push('First open the required URL in a new tab.');
  }
  pieces.push('Only perform the minimum actions needed and then stop.');
  return pieces.join('\n\n');
}

export function composeAgentInstruction(
  instruction: string,
  context: string,
  startUrl: string,
  clickTarget: string,
): string {
  const pieces = [`User request: ${instruction}`];
  if (context) pieces.push(`Context: ${context}`);
  if (startUrl) pieces.push(`Open this URL first: ${startUrl}`);
  if (clickTarget) {
    pieces.push(`Then click the UI element labeled "${clickTarget}".`);
    pieces.push('If there are multiple matches, choose the most primary call-to-action.');
  }
  pieces.push('Autonomously navigate and finish the task.');
  pieces.push('Stop once the request is complete.');
  return pieces.join('\n\n');
}

export function compose(
  instruction: string,
  context: string,
  startUrl: string,
): ComposedInstruction {
  const clickTarget = extractClickTarget(instruction);
  return {
    taskPrompt: composeTaskPrompt(instruction, context, startUrl),
    agentInstruction: composeAgentInstruction(instruction, context, startUrl, clickTarget),
    clickTarget,
  };
}

// The external tool takes one line rather than the paragraph form.
export function composeExternalToolInstruction(instruction: string, startUrl: string): string {
  const pieces: string[] = [];
  if (startUrl) pieces.push(`Open ${startUrl} first.`);
  pieces.push(instruction);
  pieces.push('Stop when complete.');
  return pieces.join(' ');
}

// ── Action phrasings ─────────────────────────────────────────

export const actionPrompts = {
  click: (target: string): string =>
    `Click "${target}" on the current page. If needed, scroll and then click exactly once.`,
  directClick: (target: string): string => `Click "${target}"`,
  primaryCallToAction: (target: string): string =>
    `Find and click the primary visible call-to-action matching "${target}". Scroll if needed, then click it once.`,
} as const;

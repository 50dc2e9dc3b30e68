/**
 * Dispatch payload templates. Each kind renders the text typed into the
 * terminal; none of them changes how replies are collected.
 */
export type PayloadKind = 'plain' | 'loop' | 'metaLoop';

export const LOOP_MAX_ITERATIONS = 5;
export const COMPLETION_PROMISE = 'DONE';

const SECTION_SEPARATOR = '\n\n---\n\n';

export const META_LOOP_INSTRUCTION = `[Self-update protocol]
This is a self-referential loop. You must:
1. Complete the user's request
2. Identify the key facts and lessons from this round
3. End your reply with the updated system prompt inside a <memory_update> element

Format:
<memory_update>
[complete updated prompt]
</memory_update>`;

function escapeQuotes(text: string): string {
  return text.replace(/"/g, '\\"');
}

/** Memory block and meta prompt ahead of the user's text */
export function plainPayload(userText: string, memoryBlock = '', metaPrompt = ''): string {
  const parts: string[] = [];
  if (memoryBlock) parts.push(memoryBlock);
  if (metaPrompt) parts.push(`[System instructions]\n${metaPrompt}`);
  if (parts.length === 0) return userText;
  return [...parts, userText].join(SECTION_SEPARATOR);
}

/** Iterative-loop command that repeats until the agent prints the completion promise */
export function loopPayload(prompt: string): string {
  const full = `${escapeQuotes(prompt)} Output <promise>${COMPLETION_PROMISE}</promise> when complete.`;
  return `/ralph-loop:ralph-loop "${full}" --max-iterations ${LOOP_MAX_ITERATIONS} --completion-promise "${COMPLETION_PROMISE}"`;
}

/** Loop that also asks the agent to rewrite its own prompt as an annotation */
export function metaLoopPayload(userText: string, metaPrompt = ''): string {
  const request = `User request: ${userText}\n\nComplete the task and output the memory update.`;
  const prompt = metaPrompt
    ? `[System role]\n${metaPrompt}\n\n${META_LOOP_INSTRUCTION}${SECTION_SEPARATOR}${request}`
    : `${META_LOOP_INSTRUCTION}${SECTION_SEPARATOR}${request}`;
  return loopPayload(prompt);
}

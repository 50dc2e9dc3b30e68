export const TELEGRAM_MAX_LENGTH = 4096;

/** Room kept free in each chunk for its `[i/n]` label */
const LABEL_RESERVE = 16;

export function splitMessage(text: string, maxLength = TELEGRAM_MAX_LENGTH): string[] {
  if (text.length <= maxLength) return [text];

  const chunks: string[] = [];
  let remaining = text;
  while (remaining.length > 0) {
    if (remaining.length <= maxLength) {
      chunks.push(remaining);
      break;
    }
    const cutAt = remaining.lastIndexOf('\n', maxLength);
    if (cutAt > 0) {
      chunks.push(remaining.slice(0, cutAt));
      remaining = remaining.slice(cutAt + 1);
    } else {
      chunks.push(remaining.slice(0, maxLength));
      remaining = remaining.slice(maxLength);
    }
  }
  return chunks;
}

/**
 * Split text for sending; when more than one part is needed, each part is
 * prefixed with an `[i/n]` line.
 */
export function splitLabelled(text: string, maxLength = TELEGRAM_MAX_LENGTH): string[] {
  if (text.length <= maxLength) return [text];

  const parts = splitMessage(text, maxLength - LABEL_RESERVE);
  return parts.map((part, i) => `[${i + 1}/${parts.length}]\n${part}`);
}

/** `/cmd@botname args` → `{ command: '/cmd', args }`; null for plain text */
export function parseCommand(text: string): { command: string; args: string } | null {
  if (!text.startsWith('/')) return null;

  const match = /^(\S+)(?:\s+([\s\S]*))?$/.exec(text.trim());
  if (!match) return null;

  const command = match[1].split('@')[0].toLowerCase();
  return { command, args: (match[2] ?? '').trim() };
}

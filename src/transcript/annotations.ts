export const KV_BLOCK_START = '-- memory';
export const KV_BLOCK_END = '-- done';

export const ANNOTATION_TAGS = ['observation', 'fact', 'narrative', 'concept', 'memory_update'] as const;

export interface ExtractedTurn {
  /** Prose left for the chat once annotations are removed */
  displayText: string;
  /** Captured annotation text, '' when the turn carried none */
  annotationText: string;
}

// Opening marker ends its line (alone or after prose); closing marker is alone on its line.
const KV_BLOCK_RE = /(^|[ \t]+)-- memory[ \t]*\r?\n([\s\S]*?)\r?\n[ \t]*-- done[ \t]*(?=\r?\n|$)/gm;

const TAGGED_RE = new RegExp(
  `<(${ANNOTATION_TAGS.join('|')})(?:\\s[^>]*)?>[\\s\\S]*?<\\/\\1>`,
  'g',
);

/**
 * Split a raw agent turn into user-facing prose and embedded annotations.
 * Key-value blocks come first in annotationText, tagged elements after.
 */
export function extractAnnotations(rawText: string): ExtractedTurn {
  const kvParts: string[] = [];
  const withoutKv = rawText.replace(KV_BLOCK_RE, (_match, _lead: string, body: string) => {
    kvParts.push(body);
    return '';
  });

  const tagParts: string[] = [];
  const withoutTags = withoutKv.replace(TAGGED_RE, (element: string) => {
    tagParts.push(element.trim());
    return '';
  });

  const displayText = withoutTags
    .replace(/\n(?:[ \t]*\n){3,}/g, '\n\n')
    .trim();

  const annotationText = [...kvParts, ...tagParts]
    .map((part) => part.trim())
    .filter(Boolean)
    .join('\n');

  return { displayText, annotationText };
}

/** Wrap key-value lines in block markers, the form agents are asked to emit */
export function formatKvBlock(body: string): string {
  return `${KV_BLOCK_START}\n${body}\n${KV_BLOCK_END}\n`;
}

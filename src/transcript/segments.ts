import { z } from 'zod';
import { ANNOTATION_TAGS } from './annotations';

export const TOOL_RESULT_MAX_CHARS = 3000;

const TextSegmentSchema = z.object({ type: z.literal('text'), text: z.string() });
const ReasoningSegmentSchema = z.object({ type: z.enum(['thinking', 'redacted_thinking']) });
const ToolUseSegmentSchema = z.object({
  type: z.literal('tool_use'),
  name: z.string().default('tool'),
  input: z.unknown().optional(),
});
const ToolResultPartSchema = z
  .object({ type: z.string(), text: z.string().optional() })
  .passthrough();
const ToolResultSegmentSchema = z.object({
  type: z.literal('tool_result'),
  content: z.union([z.string(), z.array(ToolResultPartSchema)]).optional(),
  is_error: z.boolean().optional(),
});
const ArtifactSegmentSchema = z.object({
  type: z.literal('artifact'),
  title: z.string().optional(),
  content_type: z.string().optional(),
  content: z.string().default(''),
});

export const SegmentSchema = z.discriminatedUnion('type', [
  TextSegmentSchema,
  ReasoningSegmentSchema,
  ToolUseSegmentSchema,
  ToolResultSegmentSchema,
  ArtifactSegmentSchema,
]);

export type Segment = z.infer<typeof SegmentSchema>;
export type ToolResultSegment = z.infer<typeof ToolResultSegmentSchema>;
export type ArtifactSegment = z.infer<typeof ArtifactSegmentSchema>;

const BARE_TAG_RE = /^<([A-Za-z][\w:.-]*)(?:\s[^<>]*)?>[\s\S]*<\/\1\s*>$/;

const ANNOTATION_TAG_NAMES: ReadonlySet<string> = new Set(ANNOTATION_TAGS);

/**
 * True when a text segment is one tag-wrapped element rather than prose:
 * after trimming it opens with `<name ...>` and closes with the matching
 * `</name>`. Prose that merely contains markup, or starts and ends with
 * angle brackets of different tags, is kept. Annotation elements are kept
 * too; the annotation extractor removes them from the reply.
 */
export function isBareTagSegment(text: string): boolean {
  const trimmed = text.trim();
  if (!trimmed.startsWith('<') || !trimmed.endsWith('>')) return false;
  const match = BARE_TAG_RE.exec(trimmed);
  return match !== null && !ANNOTATION_TAG_NAMES.has(match[1]);
}

const CONTENT_TYPE_LANGUAGES: Record<string, string> = {
  'application/json': 'json',
  'application/javascript': 'javascript',
  'application/typescript': 'typescript',
  'application/xml': 'xml',
  'application/x-sh': 'bash',
  'application/x-yaml': 'yaml',
  'text/html': 'html',
  'text/css': 'css',
  'text/markdown': 'markdown',
  'text/x-python': 'python',
  'image/svg+xml': 'xml',
};

const SUFFIX_LANGUAGES: Record<string, string> = {
  py: 'python',
  ts: 'typescript',
  tsx: 'tsx',
  js: 'javascript',
  jsx: 'jsx',
  json: 'json',
  md: 'markdown',
  html: 'html',
  css: 'css',
  sh: 'bash',
  yml: 'yaml',
  yaml: 'yaml',
  go: 'go',
  rs: 'rust',
  sql: 'sql',
};

/** Best-effort code-fence language for an artifact */
export function languageHint(contentType?: string, title?: string): string {
  if (contentType) {
    const base = contentType.split(';')[0].trim().toLowerCase();
    const known = CONTENT_TYPE_LANGUAGES[base];
    if (known) return known;
    // text/x-rust, application/vnd.code+ruby and friends
    const tail = /(?:x-|\+)([a-z0-9]+)$/.exec(base);
    if (tail) return SUFFIX_LANGUAGES[tail[1]] ?? tail[1];
  }
  if (title) {
    const suffix = /\.([A-Za-z0-9]+)$/.exec(title.trim());
    if (suffix) return SUFFIX_LANGUAGES[suffix[1].toLowerCase()] ?? '';
  }
  return '';
}

function fence(body: string, language = ''): string {
  return `\`\`\`${language}\n${body}\n\`\`\``;
}

function truncate(text: string, max: number): string {
  if (text.length <= max) return text;
  return `${text.slice(0, max)}\n… [truncated ${text.length - max} chars]`;
}

function toolResultBody(segment: ToolResultSegment): string {
  const { content } = segment;
  if (content === undefined) return '';
  if (typeof content === 'string') return content;
  return content
    .map((part) => {
      if (part.type === 'text') return part.text ?? '';
      return `[${part.type}]`;
    })
    .filter(Boolean)
    .join('\n');
}

/**
 * Render one content segment for display. Returns null for segments that are
 * never user-facing or carry nothing.
 */
export function renderSegment(segment: Segment): string | null {
  switch (segment.type) {
    case 'text': {
      if (!segment.text.trim() || isBareTagSegment(segment.text)) return null;
      return segment.text;
    }
    case 'thinking':
    case 'redacted_thinking':
      return null;
    case 'tool_use': {
      const input = JSON.stringify(segment.input ?? {}, null, 2);
      return `🔧 ${segment.name}\n${fence(input, 'json')}`;
    }
    case 'tool_result': {
      const label = segment.is_error ? '❌ Error' : '📋 Result';
      const body = truncate(toolResultBody(segment), TOOL_RESULT_MAX_CHARS);
      return `${label}\n${fence(body)}`;
    }
    case 'artifact': {
      const title = segment.title?.trim() || 'Artifact';
      const contentType = segment.content_type ?? 'text/plain';
      const language = languageHint(segment.content_type, segment.title);
      return `📄 ${title} (${contentType})\n${fence(segment.content, language)}`;
    }
  }
}

import { readFileSync } from 'node:fs';
import type { MemoryConfig, MetaPromptConfig } from '../config';
import type { Logger } from '../logger';
import { formatForInjection, type MemoryStore } from '../memory/store';
import { loopPayload, metaLoopPayload, plainPayload, type PayloadKind } from './payload-templates';

/**
 * Pull the body of a `## <heading>` section out of a markdown document,
 * up to the next second-level heading.
 */
export function extractMetaPrompt(markdown: string, heading: string): string {
  if (!markdown) return '';

  const lines = markdown.split('\n');
  const collected: string[] = [];
  let inSection = false;

  for (const line of lines) {
    if (!inSection) {
      if (line.trim() === `## ${heading}`) inSection = true;
      continue;
    }
    if (line.startsWith('## ')) break;
    collected.push(line);
  }

  return collected.join('\n').trim();
}

export class PromptBuilder {
  constructor(
    private memoryConfig: MemoryConfig,
    private metaConfig: MetaPromptConfig,
    private memory: MemoryStore | null,
    private logger: Logger,
  ) {}

  build(kind: PayloadKind, owner: string, userText: string): string {
    switch (kind) {
      case 'plain':
        return plainPayload(userText, this.memoryBlock(owner, userText), this.loadMetaPrompt());
      case 'loop':
        return loopPayload(userText);
      case 'metaLoop':
        return metaLoopPayload(userText, this.loadMetaPrompt());
    }
  }

  /** Relevant memories for this owner, rendered for injection; '' when none */
  memoryBlock(owner: string, userText: string): string {
    if (!this.memory || !this.memoryConfig.enabled) return '';

    const matches = this.memory.search(owner, userText, this.memoryConfig.maxResults);
    if (matches.length === 0) return '';

    const block = formatForInjection(matches, this.memoryConfig.maxContextChars);
    if (block) {
      this.logger.debug({ owner, memories: matches.length }, 'Injected memories into prompt');
    }
    return block;
  }

  /** Meta prompt from the first readable instruction file, '' when none has one */
  loadMetaPrompt(): string {
    for (const path of this.metaConfig.files) {
      let content: string;
      try {
        content = readFileSync(path, 'utf-8');
      } catch {
        continue;
      }
      const prompt = extractMetaPrompt(content, this.metaConfig.heading);
      if (prompt) return prompt;
    }
    return '';
  }
}

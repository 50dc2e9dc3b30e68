import { readFileSync } from 'node:fs';
import { homedir } from 'node:os';
import { join } from 'node:path';
import { z } from 'zod';

/** Expand a leading `~/` to the current user's home directory */
export function expandHome(path: string): string {
  if (path === '~') return homedir();
  if (path.startsWith('~/')) return join(homedir(), path.slice(2));
  return path;
}

const PathSchema = z.string().min(1).transform(expandHome);

// Zod schemas for type-safe configuration
const TelegramConfigSchema = z.object({
  token: z.string().min(1),
  allowedChats: z.array(z.number().int()).optional(),
  pollTimeoutSec: z.number().int().min(0).max(50).default(30),
  retryDelayMs: z.number().int().positive().default(5000),
  maxMessageLength: z.number().int().min(64).max(4096).default(4096),
});

const TmuxConfigSchema = z.object({
  session: z.string().min(1).default('claude'),
  agentCommand: z.string().min(1).default('claude --dangerously-skip-permissions'),
  keyDelayMs: z.number().int().min(0).default(200),
  restartDelayMs: z.number().int().min(0).default(500),
});

const TranscriptsConfigSchema = z.object({
  dir: PathSchema.default('~/.claude/projects'),
  pollIntervalMs: z.number().int().positive().default(1000),
  watchEnabled: z.boolean().default(true),
  maxTrackedFiles: z.number().int().min(1).default(8),
  checkpointPath: PathSchema.optional(),
});

const ResponseConfigSchema = z.object({
  pendingTimeoutMs: z.number().int().positive().default(600_000), // 10 min
  typingIntervalMs: z.number().int().positive().default(4000),
  conversationMaxChars: z.number().int().positive().default(2000),
  annotationMaxChars: z.number().int().positive().default(5000),
});

const DispatchConfigSchema = z.object({
  coalesceMs: z.number().int().min(0).default(300),
});

const MemoryConfigSchema = z.object({
  enabled: z.boolean().default(true),
  dbPath: PathSchema.default('./data/memory.db'),
  maxResults: z.number().int().positive().default(5),
  maxContextChars: z.number().int().positive().default(2000),
});

const MetaPromptConfigSchema = z.object({
  files: z.array(PathSchema).default(['.CLAUDE.md', '~/.claude/.CLAUDE.md']),
  heading: z.string().min(1).default('Initial Prompt'),
});

const StateConfigSchema = z.object({
  dir: PathSchema.default('./data'),
});

const LoggingConfigSchema = z.object({
  level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  file: z.string().optional(),
});

const ConfigSchema = z.object({
  telegram: TelegramConfigSchema,
  tmux: TmuxConfigSchema.default({}),
  transcripts: TranscriptsConfigSchema.default({}),
  response: ResponseConfigSchema.default({}),
  dispatch: DispatchConfigSchema.default({}),
  memory: MemoryConfigSchema.default({}),
  metaPrompt: MetaPromptConfigSchema.default({}),
  state: StateConfigSchema.default({}),
  claudeHome: PathSchema.default('~/.claude'),
  logging: LoggingConfigSchema.default({}),
});

export type Config = z.infer<typeof ConfigSchema>;
export type TelegramConfig = z.infer<typeof TelegramConfigSchema>;
export type TmuxConfig = z.infer<typeof TmuxConfigSchema>;
export type TranscriptsConfig = z.infer<typeof TranscriptsConfigSchema>;
export type ResponseConfig = z.infer<typeof ResponseConfigSchema>;
export type DispatchConfig = z.infer<typeof DispatchConfigSchema>;
export type MemoryConfig = z.infer<typeof MemoryConfigSchema>;
export type MetaPromptConfig = z.infer<typeof MetaPromptConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;

/**
 * Substitute environment variables in strings
 * Supports ${VAR_NAME} syntax
 */
export function substituteEnvVars(obj: unknown, env: NodeJS.ProcessEnv = process.env): unknown {
  if (typeof obj === 'string') {
    return obj.replace(/\$\{([^}]+)\}/g, (_, varName: string) => {
      const value = env[varName];
      if (value === undefined) {
        throw new Error(`Environment variable ${varName} is not defined`);
      }
      return value;
    });
  }

  if (Array.isArray(obj)) {
    return obj.map((item) => substituteEnvVars(item, env));
  }

  if (obj !== null && typeof obj === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      result[key] = substituteEnvVars(value, env);
    }
    return result;
  }

  return obj;
}

/**
 * Validate an already-parsed config object (env placeholders resolved first)
 */
export function parseConfig(raw: unknown, env: NodeJS.ProcessEnv = process.env): Config {
  return ConfigSchema.parse(substituteEnvVars(raw, env));
}

/**
 * Load and validate configuration from file
 */
export function loadConfig(configPath: string): Config {
  try {
    const content = readFileSync(configPath, 'utf-8');
    const rawConfig: unknown = JSON.parse(content);
    return parseConfig(rawConfig);
  } catch (error) {
    if (error instanceof z.ZodError) {
      console.error('Configuration validation failed:');
      for (const issue of error.issues) {
        console.error(`  - ${issue.path.join('.')}: ${issue.message}`);
      }
      throw new Error('Invalid configuration');
    }
    throw error;
  }
}

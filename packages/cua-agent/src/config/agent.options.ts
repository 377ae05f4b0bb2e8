import { ConfigService } from '@nestjs/config';
import { z } from 'zod';
import { DesktopBackend } from '@cua/shared';
import { ModelClient } from '../agent/agent.types';
import { DEFAULT_MODEL, DEFAULT_THINKING_BUDGET } from '../google/google.constants';
import { DEFAULT_ACTIONS_PER_MINUTE, TakeoverHandler } from '../safety';

export const agentOptionsSchema = z.object({
  apiKey: z.string().optional(),
  /** `flash`, `pro` or a raw Gemini model id. */
  model: z.string().min(1).default(DEFAULT_MODEL.alias),
  safetyLevel: z.enum(['minimal', 'normal', 'strict']).default('normal'),
  timeoutMs: z.number().int().positive().default(120_000),
  maxActions: z.number().int().positive().default(50),
  verbose: z.boolean().default(false),
  headless: z.boolean().default(false),
  rateLimitPerMinute: z
    .number()
    .int()
    .default(DEFAULT_ACTIONS_PER_MINUTE)
    .transform((value) => (value > 0 ? value : DEFAULT_ACTIONS_PER_MINUTE)),
  maxConsecutiveFailures: z.number().int().positive().default(5),
  screenIndex: z.number().int().min(0).default(0),
  auditLogPath: z.string().optional(),
  thinkingBudget: z.number().int().min(0).default(DEFAULT_THINKING_BUDGET),
  maxScreenshotDim: z.number().int().positive().default(1280),
  jpegQuality: z.number().int().min(1).max(100).default(60),
});

/** Resolved, serializable agent settings. */
export type AgentConfig = z.output<typeof agentOptionsSchema>;

export interface AgentOptions extends z.input<typeof agentOptionsSchema> {
  /** Answers takeovers when the agent is not headless. */
  onTakeover?: TakeoverHandler;
  /** Replaces the Gemini client. */
  modelClient?: ModelClient;
  /** Replaces the native desktop backend. */
  backend?: DesktopBackend;
}

export interface AgentCollaborators {
  onTakeover?: TakeoverHandler;
  modelClient?: ModelClient;
  backend?: DesktopBackend;
}

/**
 * Validates options and fills defaults. The API key falls back to
 * `GOOGLE_API_KEY`, then `GEMINI_API_KEY`.
 */
export function parseAgentOptions(
  options: AgentOptions = {},
  configService: ConfigService = new ConfigService(),
): { config: AgentConfig; collaborators: AgentCollaborators } {
  const { onTakeover, modelClient, backend, ...settings } = options;
  const config = agentOptionsSchema.parse(settings);

  const apiKey =
    config.apiKey ||
    configService.get<string>('GOOGLE_API_KEY') ||
    configService.get<string>('GEMINI_API_KEY') ||
    undefined;

  return {
    config: { ...config, apiKey },
    collaborators: { onTakeover, modelClient, backend },
  };
}

/** Copy of the config with the API key reduced to its last four characters. */
export function redactConfig(config: AgentConfig): AgentConfig {
  if (!config.apiKey) {
    return { ...config };
  }
  return { ...config, apiKey: `****${config.apiKey.slice(-4)}` };
}

import { Logger } from '@nestjs/common';
import {
  Content,
  GenerateContentResponse,
  GoogleGenAI,
  Part,
} from '@google/genai';
import { v4 as uuid } from 'uuid';
import {
  abortReason,
  CuaError,
  CuaErrorCode,
  describeError,
  Message,
  MessageContentBlock,
  MessageContentType,
  Role,
} from '@cua/shared';
import { ModelClient, ModelRequest, ModelResponse } from '../agent/agent.types';
import {
  DEFAULT_MAX_OUTPUT_TOKENS,
  DEFAULT_MODEL,
  DEFAULT_THINKING_BUDGET,
  MODEL_RATE_LIMIT_MESSAGE,
  resolveModelName,
} from './google.constants';
import { toGoogleTools } from './google.tools';

export interface GoogleModelClientOptions {
  apiKey: string;
  /** `flash`, `pro` or a raw model id. */
  model?: string;
  /** Thinking tokens per turn; 0 disables thinking. */
  thinkingBudget?: number;
  maxOutputTokens?: number;
}

const RATE_LIMIT_PATTERN = /\b429\b|RESOURCE_EXHAUSTED/i;

export function isModelRateLimitError(error: unknown): boolean {
  return RATE_LIMIT_PATTERN.test(describeError(error));
}

function isAbortError(error: unknown): boolean {
  return (
    error instanceof Error &&
    (error.name === 'AbortError' || error.message.includes('AbortError'))
  );
}

/**
 * Gemini client through `@google/genai`. Converts the conversation into
 * Gemini contents and the response parts back into content blocks.
 */
export class GoogleModelClient implements ModelClient {
  private readonly logger = new Logger(GoogleModelClient.name);
  private readonly google: GoogleGenAI;
  private readonly thinkingBudget: number;
  private readonly maxOutputTokens: number;
  readonly modelName: string;

  constructor(options: GoogleModelClientOptions) {
    this.google = new GoogleGenAI({ apiKey: options.apiKey });
    this.modelName = resolveModelName(options.model ?? DEFAULT_MODEL.name);
    this.thinkingBudget = options.thinkingBudget ?? DEFAULT_THINKING_BUDGET;
    this.maxOutputTokens = options.maxOutputTokens ?? DEFAULT_MAX_OUTPUT_TOKENS;
  }

  async generateMessage({
    systemPrompt,
    messages,
    tools,
    signal,
  }: ModelRequest): Promise<ModelResponse> {
    try {
      const response: GenerateContentResponse =
        await this.google.models.generateContent({
          model: this.modelName,
          contents: formatMessagesForGoogle(messages),
          config: {
            thinkingConfig: {
              thinkingBudget: this.thinkingBudget,
              includeThoughts: this.thinkingBudget > 0,
            },
            maxOutputTokens: this.maxOutputTokens,
            systemInstruction: systemPrompt,
            tools:
              tools.length > 0
                ? [{ functionDeclarations: toGoogleTools(tools) }]
                : [],
            abortSignal: signal,
          },
        });

      const candidate = response.candidates?.[0];
      if (!candidate) {
        throw new Error('No candidate found in response');
      }

      const parts = candidate.content?.parts;
      if (!parts || parts.length === 0) {
        this.logger.warn(
          `Empty response from ${this.modelName} (finish reason: ${candidate.finishReason ?? 'unknown'})`,
        );
      }

      return {
        contentBlocks: this.formatGoogleResponse(parts ?? []),
        tokenUsage: {
          inputTokens: response.usageMetadata?.promptTokenCount || 0,
          outputTokens: response.usageMetadata?.candidatesTokenCount || 0,
          totalTokens: response.usageMetadata?.totalTokenCount || 0,
        },
      };
    } catch (error) {
      if (signal?.aborted) {
        throw abortReason(signal);
      }
      if (isAbortError(error)) {
        throw new CuaError(CuaErrorCode.Canceled, undefined, { cause: error });
      }
      if (isModelRateLimitError(error)) {
        this.logger.warn(`Rate limited by ${this.modelName}`);
        throw new CuaError(CuaErrorCode.RateLimited, MODEL_RATE_LIMIT_MESSAGE, {
          cause: error,
        });
      }
      this.logger.error(
        `Error sending message to Google Gemini: ${describeError(error)}`,
        error instanceof Error ? error.stack : undefined,
      );
      throw error;
    }
  }

  private formatGoogleResponse(parts: Part[]): MessageContentBlock[] {
    return parts.flatMap((part): MessageContentBlock[] => {
      if (part.functionCall) {
        return [
          {
            type: MessageContentType.ToolUse,
            id: part.functionCall.id || uuid(),
            name: part.functionCall.name ?? '',
            input: part.functionCall.args ?? {},
            signature: part.thoughtSignature,
          },
        ];
      }

      if (part.text !== undefined && part.thought) {
        return [
          {
            type: MessageContentType.Thinking,
            thinking: part.text,
            signature: part.thoughtSignature,
          },
        ];
      }

      if (part.text !== undefined) {
        return [{ type: MessageContentType.Text, text: part.text }];
      }

      this.logger.warn(
        `Unknown content type from Google: ${JSON.stringify(part)}`,
      );
      return [];
    });
  }
}

/**
 * Converts the conversation into Gemini contents. Tool results become
 * function responses, followed by the screenshot as inline data.
 */
export function formatMessagesForGoogle(messages: Message[]): Content[] {
  return messages.map((message) => {
    const parts: Part[] = [];

    for (const block of message.content) {
      switch (block.type) {
        case MessageContentType.Text:
          parts.push({ text: block.text });
          break;
        case MessageContentType.Image:
          parts.push({
            inlineData: {
              data: block.source.data,
              mimeType: block.source.media_type,
            },
          });
          break;
        case MessageContentType.Thinking:
          parts.push({
            text: block.thinking,
            thought: true,
            thoughtSignature: block.signature,
          });
          break;
        case MessageContentType.ToolUse:
          parts.push({
            functionCall: {
              id: block.id,
              name: block.name,
              args: block.input,
            },
            thoughtSignature: block.signature,
          });
          break;
        case MessageContentType.ToolResult:
          parts.push({
            functionResponse: {
              id: block.tool_use_id,
              name: block.name,
              response: block.is_error
                ? { error: block.content }
                : { output: block.content },
            },
          });
          if (block.image) {
            parts.push({
              inlineData: {
                data: block.image.source.data,
                mimeType: block.image.source.media_type,
              },
            });
          }
          break;
      }
    }

    return {
      role: message.role === Role.User ? 'user' : 'model',
      parts,
    };
  });
}

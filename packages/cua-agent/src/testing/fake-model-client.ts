import {
  abortable,
  MessageContentBlock,
  MessageContentType,
  throwIfAborted,
} from '@cua/shared';
import { ModelClient, ModelRequest, ModelResponse } from '../agent/agent.types';

export type ScriptedTurn =
  | MessageContentBlock[]
  | ((request: ModelRequest) => MessageContentBlock[] | Promise<MessageContentBlock[]>);

let callCounter = 0;

export function toolCall(
  name: string,
  input: Record<string, unknown> = {},
): MessageContentBlock {
  callCounter++;
  return {
    type: MessageContentType.ToolUse,
    id: `call-${callCounter}`,
    name,
    input,
  };
}

export function text(value: string): MessageContentBlock {
  return { type: MessageContentType.Text, text: value };
}

/**
 * Replays a fixed list of turns. Once the script runs out, `fallback` is
 * repeated; without one the client throws.
 */
export class FakeModelClient implements ModelClient {
  readonly modelName = 'fake-model';
  readonly requests: ModelRequest[] = [];
  private cursor = 0;

  constructor(
    private readonly script: ScriptedTurn[],
    private readonly fallback?: ScriptedTurn,
  ) {}

  static repeating(turn: ScriptedTurn): FakeModelClient {
    return new FakeModelClient([], turn);
  }

  async generateMessage(request: ModelRequest): Promise<ModelResponse> {
    throwIfAborted(request.signal);
    this.requests.push({ ...request, messages: [...request.messages] });

    const turn = this.script[this.cursor] ?? this.fallback;
    this.cursor++;
    if (!turn) {
      throw new Error(`fake model script exhausted after ${this.script.length} turns`);
    }

    const blocks = await abortable(
      Promise.resolve(typeof turn === 'function' ? turn(request) : turn),
      request.signal,
    );
    return {
      contentBlocks: blocks.map((block) =>
        block.type === MessageContentType.ToolUse
          ? { ...block, id: `${block.id}-${this.cursor}` }
          : block,
      ),
      tokenUsage: { inputTokens: 10, outputTokens: 5, totalTokens: 15 },
    };
  }

  get turns(): number {
    return this.requests.length;
  }
}

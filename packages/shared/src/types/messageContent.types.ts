// Content block types
export enum MessageContentType {
  Text = "text",
  Image = "image",
  ToolUse = "tool_use",
  ToolResult = "tool_result",
  Thinking = "thinking",
}

export enum Role {
  User = "user",
  Assistant = "assistant",
}

export type TextContentBlock = {
  type: MessageContentType.Text;
  text: string;
};

export type ImageContentBlock = {
  type: MessageContentType.Image;
  source: {
    media_type: "image/jpeg" | "image/png";
    type: "base64";
    data: string;
  };
};

export type ThinkingContentBlock = {
  type: MessageContentType.Thinking;
  thinking: string;
  signature?: string;
};

export type ToolUseContentBlock = {
  type: MessageContentType.ToolUse;
  id: string;
  name: string;
  input: Record<string, unknown>;
  /** Opaque provider signature that must be replayed with the call. */
  signature?: string;
};

/**
 * Observation returned to the model for one tool call. `content` is the
 * tool's JSON result; a screenshot travels separately as `image` so that
 * providers can attach it as inline media.
 */
export type ToolResultContentBlock = {
  type: MessageContentType.ToolResult;
  tool_use_id: string;
  name: string;
  content: Record<string, unknown>;
  image?: ImageContentBlock;
  is_error?: boolean;
};

export type MessageContentBlock =
  | TextContentBlock
  | ImageContentBlock
  | ThinkingContentBlock
  | ToolUseContentBlock
  | ToolResultContentBlock;

export interface Message {
  role: Role;
  content: MessageContentBlock[];
}

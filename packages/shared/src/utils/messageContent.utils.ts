import {
  ImageContentBlock,
  Message,
  MessageContentBlock,
  MessageContentType,
  Role,
  TextContentBlock,
  ThinkingContentBlock,
  ToolResultContentBlock,
  ToolUseContentBlock,
} from "../types/messageContent.types";

export function isTextContentBlock(
  block: MessageContentBlock,
): block is TextContentBlock {
  return block.type === MessageContentType.Text;
}

export function isImageContentBlock(
  block: MessageContentBlock,
): block is ImageContentBlock {
  return block.type === MessageContentType.Image;
}

export function isThinkingContentBlock(
  block: MessageContentBlock,
): block is ThinkingContentBlock {
  return block.type === MessageContentType.Thinking;
}

export function isToolUseContentBlock(
  block: MessageContentBlock,
): block is ToolUseContentBlock {
  return block.type === MessageContentType.ToolUse;
}

export function isToolResultContentBlock(
  block: MessageContentBlock,
): block is ToolResultContentBlock {
  return block.type === MessageContentType.ToolResult;
}

export function textMessage(role: Role, text: string): Message {
  return {
    role,
    content: [{ type: MessageContentType.Text, text }],
  };
}

/**
 * Joins the text blocks of a response, ignoring thinking and tool calls.
 */
export function extractText(blocks: MessageContentBlock[]): string {
  return blocks
    .filter(isTextContentBlock)
    .map((block) => block.text.trim())
    .filter((text) => text.length > 0)
    .join(" ");
}

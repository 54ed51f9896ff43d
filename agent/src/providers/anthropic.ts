/**
 * Translation between Anthropic Messages API tool blocks and ToolCall /
 * ToolResult. The executor stays provider-agnostic; only this module knows the
 * SDK's shapes.
 */

import type Anthropic from "@anthropic-ai/sdk";
import type { ToolCall, ToolDefinition, ToolResult } from "../tools/types.js";

const MAX_TOOL_OUTPUT = 50_000; // chars

export function toAnthropicTools(tools: ToolDefinition[]): Anthropic.Messages.Tool[] {
  return tools.map((tool) => ({
    name: tool.name,
    description: tool.description,
    input_schema: {
      type: "object" as const,
      properties: tool.parameters.properties,
      ...(tool.parameters.required && { required: tool.parameters.required }),
    },
  }));
}

export function toolCallFromAnthropic(block: Anthropic.Messages.ToolUseBlock): ToolCall {
  const input = block.input;
  return {
    callId: block.id,
    name: block.name,
    arguments:
      typeof input === "object" && input !== null && !Array.isArray(input) ? Object.fromEntries(Object.entries(input)) : {},
  };
}

function resultText(result: ToolResult): string {
  if (!result.ok) {
    return `${result.error.kind}: ${result.error.message}`;
  }
  return typeof result.content === "string" ? result.content : JSON.stringify(result.content, null, 2);
}

export function toolResultToAnthropic(result: ToolResult): Anthropic.Messages.ToolResultBlockParam {
  const text = resultText(result);
  const content =
    text.length > MAX_TOOL_OUTPUT ? `${text.slice(0, MAX_TOOL_OUTPUT)}\n[truncated ${text.length - MAX_TOOL_OUTPUT} chars]` : text;
  return {
    type: "tool_result",
    tool_use_id: result.callId,
    content,
    ...(!result.ok && { is_error: true }),
  };
}

import OpenAI from "openai";
import type { ChatModel, ChatTurn, ToolSpec } from "../agent/schema.js";

export interface OpenAiChatOptions {
  apiKey: string;
  baseUrl?: string;
  model: string;
  temperature: number;
  timeoutMs?: number;
}

function toMessage(turn: ChatTurn): OpenAI.Chat.ChatCompletionMessageParam {
  switch (turn.role) {
    case "system":
      return { role: "system", content: turn.content };
    case "user":
      return { role: "user", content: turn.content };
    case "assistant":
      if (turn.toolCalls && turn.toolCalls.length > 0) {
        return {
          role: "assistant",
          content: turn.content,
          tool_calls: turn.toolCalls.map((call) => ({
            id: call.id,
            type: "function" as const,
            function: { name: call.name, arguments: call.arguments }
          }))
        };
      }
      return { role: "assistant", content: turn.content ?? "" };
    case "tool":
      return { role: "tool", tool_call_id: turn.toolCallId, content: turn.content };
  }
}

function toTool(tool: ToolSpec): OpenAI.Chat.ChatCompletionTool {
  return {
    type: "function",
    function: { name: tool.name, description: tool.description, parameters: tool.parameters }
  };
}

// Any OpenAI-compatible endpoint works (DeepSeek, Qwen, a local gateway) via baseUrl.
export function makeOpenAiChatModel(options: OpenAiChatOptions, client?: OpenAI): ChatModel {
  const openai =
    client ??
    new OpenAI({
      apiKey: options.apiKey,
      baseURL: options.baseUrl,
      timeout: options.timeoutMs ?? 60_000
    });

  return {
    async complete({ messages, tools }) {
      const res = await openai.chat.completions.create({
        model: options.model,
        temperature: options.temperature,
        messages: messages.map(toMessage),
        tools: tools.length > 0 ? tools.map(toTool) : undefined
      });

      const message = res.choices[0]?.message;
      return {
        content: message?.content ?? null,
        toolCalls: (message?.tool_calls ?? []).map((call) => ({
          id: call.id,
          name: call.function.name,
          arguments: call.function.arguments
        }))
      };
    }
  };
}

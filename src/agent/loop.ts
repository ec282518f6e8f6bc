import type { AgentContext, ChatTurn, ToolOutcome } from "./schema.js";
import { FeederError, errorMessage } from "./errors.js";
import { buildSystemPrompt, buildUserMessage, DEFAULT_REPLY, describeDevices } from "./prompts.js";
import { findTool, toolSpecs } from "./toolset.js";
import { formatWallTime, nowIn } from "../tools/time.js";

// start, done and error frame a chat stream; the loop itself emits the tool events.
export type AgentEvent =
  | { type: "start"; query: string; session_id: string }
  | { type: "tool_call"; id: string; name: string; arguments: unknown }
  | { type: "tool_result"; id: string; name: string; result: ToolOutcome }
  | { type: "done"; reply: string; session_id: string }
  | { type: "error"; message: string };

export interface AgentStep {
  tool: string;
  arguments: unknown;
  result: ToolOutcome;
}

export interface AgentRun {
  reply: string;
  steps: AgentStep[];
  limitReached: boolean;
}

export interface RunAgentOptions {
  onEvent?: (event: AgentEvent) => void;
  /** Pre-rendered device block; fetched from the feeder cloud when omitted. */
  devicesInfo?: string | null;
}

async function loadDevicesInfo(context: AgentContext): Promise<string | null> {
  try {
    return describeDevices(await context.tools.feeder.listDevices());
  } catch (error) {
    context.tools.logger.warn(`Device list unavailable for prompt: ${errorMessage(error)}`);
    return null;
  }
}

function parseArguments(raw: string): { ok: true; value: unknown } | { ok: false } {
  if (!raw.trim()) return { ok: true, value: {} };
  try {
    const value: unknown = JSON.parse(raw);
    return { ok: true, value };
  } catch {
    return { ok: false };
  }
}

/**
 * Runs one request through the tool-calling loop. Tool calls beyond the
 * configured limit are answered with an error, and the model then gets one
 * final turn without tools.
 */
export async function runAgent(
  context: AgentContext,
  query: string,
  options: RunAgentOptions = {}
): Promise<AgentRun> {
  const { llm } = context;
  if (!llm) {
    throw new FeederError("LLM is not configured (LLM_API_KEY)", "invalid_params");
  }

  const emit = options.onEvent ?? (() => undefined);
  const { logger } = context.tools;
  const { timezone } = context.config.scheduler;
  const limit = context.config.limits.maxToolCalls;
  const specs = toolSpecs();

  const devicesInfo = options.devicesInfo === undefined ? await loadDevicesInfo(context) : options.devicesInfo;
  const currentTime = `${formatWallTime(nowIn(timezone, context.now()))} (${timezone})`;
  const messages: ChatTurn[] = [
    {
      role: "system",
      content: buildSystemPrompt({ portionGrams: context.config.feeder.portionGrams, timezone })
    },
    { role: "user", content: buildUserMessage(query, { devicesInfo, currentTime }) }
  ];

  const steps: AgentStep[] = [];
  let calls = 0;
  let limitReached = false;

  for (;;) {
    const response = await llm.complete({ messages, tools: limitReached ? [] : specs });

    if (response.toolCalls.length === 0 || limitReached) {
      return { reply: response.content?.trim() || DEFAULT_REPLY, steps, limitReached };
    }

    messages.push({ role: "assistant", content: response.content, toolCalls: response.toolCalls });

    for (const call of response.toolCalls) {
      let result: ToolOutcome;
      let args: unknown = call.arguments;

      if (calls >= limit) {
        limitReached = true;
        result = { success: false, status: "failed", message: `tool call limit (${limit}) reached` };
      } else {
        calls += 1;
        const parsed = parseArguments(call.arguments);
        const tool = findTool(call.name);

        if (parsed.ok) args = parsed.value;
        emit({ type: "tool_call", id: call.id, name: call.name, arguments: args });

        if (!tool) {
          result = { success: false, status: "invalid_params", message: `unknown tool: ${call.name}` };
        } else if (!parsed.ok) {
          result = {
            success: false,
            status: "invalid_params",
            message: `arguments for ${call.name} are not valid JSON`
          };
        } else {
          logger.debug(`Tool call ${call.name} ${call.arguments}`);
          result = await tool.invoke(context, parsed.value);
        }

        emit({ type: "tool_result", id: call.id, name: call.name, result });
        steps.push({ tool: call.name, arguments: args, result });
      }

      messages.push({ role: "tool", toolCallId: call.id, content: JSON.stringify(result) });
    }
  }
}

import type { AgentContext, HistoryEventType } from "../agent/schema.js";
import { errorMessage } from "../agent/errors.js";

// History is best effort: a full disk must not fail a feed that already happened.
export async function recordHistory(
  context: AgentContext,
  type: HistoryEventType,
  input: Record<string, unknown>,
  output: Record<string, unknown>
): Promise<void> {
  try {
    await context.tools.storage.appendHistory({
      ts: context.now().toISOString(),
      type,
      input,
      output
    });
  } catch (error) {
    context.tools.logger.warn(`Could not append ${type} history: ${errorMessage(error)}`);
  }
}

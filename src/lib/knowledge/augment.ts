import { createComponentLogger } from "../observability/index.ts";
import { extractErrorMessage } from "../bridge/index.ts";
import type { KnowledgeService } from "./knowledge_service.ts";

const log = createComponentLogger("augment");

export const CONTEXT_HEADER =
  "[The following context was retrieved from the knowledge base for reference]";
export const CONTEXT_FOOTER = "[End of context]";

/**
 * Prepend relevant knowledge-base context to a user message (RAG augmentation).
 *
 * Returns the message unchanged when the service is missing or not ready,
 * when nothing relevant is found, or when retrieval fails.
 */
export async function augmentWithContext(
  service: KnowledgeService | null | undefined,
  message: string,
  limit = 3
): Promise<string> {
  if (!service || !service.ready) {
    return message;
  }
  try {
    const context = await service.retrieveContext(message, limit);
    if (context) {
      return `${CONTEXT_HEADER}\n${context}\n${CONTEXT_FOOTER}\n\n${message}`;
    }
  } catch (error) {
    log.error({ error: extractErrorMessage(error) }, "Context augmentation failed");
  }
  return message;
}

/**
 * providers/types.ts — Unified LLM provider interface
 *
 * All providers implement LLMProvider. The agent loop only speaks this
 * interface and the ChatMessage model; each provider translates to and from
 * its native format on every call.
 */

import type { ChatCompletionTool } from "openai/resources/chat/completions";
import type { AssistantMessage, ChatMessage, ToolCallRequest } from "../types.js";

export interface LLMResponse {
    /** Text content of the reply (null when the model only called tools) */
    content: string | null;
    /** Tool calls requested by the model (empty for a plain text reply) */
    toolCalls: readonly ToolCallRequest[];
    /** The assistant message, ready to push onto history */
    assistantMessage: AssistantMessage;
}

export interface LLMProvider {
    /** Stable identifier: "openai", "groq", "deepseek" */
    readonly id: string;
    /** Human-friendly display name */
    readonly name: string;
    /** Model string used for every request */
    readonly model: string;

    /**
     * Run one completion. Tools are in OpenAI function-calling format;
     * an empty or missing list means the request carries no tools.
     */
    complete(messages: readonly ChatMessage[], tools?: readonly ChatCompletionTool[]): Promise<LLMResponse>;

    /** Stream the text of one tool-free completion, fragment by fragment */
    stream(messages: readonly ChatMessage[]): AsyncIterable<string>;
}

/**
 * providers/openai-provider.ts — OpenAI + OpenAI-compatible providers
 *
 * Covers: OpenAI, DeepSeek, Groq — all speak the OpenAI API format.
 * Groq and DeepSeek just use a different baseURL.
 */

import OpenAI from "openai";
import type {
    ChatCompletionMessage,
    ChatCompletionMessageParam,
    ChatCompletionMessageToolCall,
} from "openai/resources/chat/completions";
import type { LLMProvider, LLMResponse } from "./types.js";
import type { AssistantMessage, ChatMessage } from "../types.js";
import { ProviderResponseError } from "../errors.js";
import { logger } from "../logger.js";

export interface OpenAICompatibleOptions {
    id: string;
    name: string;
    model: string;
    apiKey: string;
    baseURL?: string;
    temperature?: number;
}

export function toOpenAIMessages(messages: readonly ChatMessage[]): ChatCompletionMessageParam[] {
    return messages.map((msg): ChatCompletionMessageParam => {
        switch (msg.role) {
            case "system":
                return { role: "system", content: msg.content };
            case "user":
                return { role: "user", content: msg.content };
            case "tool":
                return { role: "tool", tool_call_id: msg.toolCallId, content: msg.content };
            case "assistant": {
                if (msg.toolCalls.length === 0) return { role: "assistant", content: msg.content };
                const toolCalls: ChatCompletionMessageToolCall[] = msg.toolCalls.map((call) => ({
                    id: call.id,
                    type: "function",
                    function: { name: call.name, arguments: call.arguments },
                }));
                return { role: "assistant", content: msg.content, tool_calls: toolCalls };
            }
        }
    });
}

export function fromOpenAIMessage(msg: ChatCompletionMessage): AssistantMessage {
    return {
        role: "assistant",
        content: msg.content,
        toolCalls: (msg.tool_calls ?? []).map((tc) => ({
            id: tc.id,
            name: tc.function.name,
            arguments: tc.function.arguments,
        })),
    };
}

export function makeOpenAICompatible(options: OpenAICompatibleOptions): LLMProvider {
    const { id, name, model, temperature } = options;
    const client = new OpenAI({ apiKey: options.apiKey, baseURL: options.baseURL });

    return {
        id,
        name,
        model,

        async complete(messages, tools = []): Promise<LLMResponse> {
            logger.debug(`[${id}] complete()`, { model, msgs: messages.length, tools: tools.length });

            const baseParams = { model, messages: toOpenAIMessages(messages), temperature };
            const response = await client.chat.completions.create(
                tools.length > 0
                    ? { ...baseParams, tools: [...tools], tool_choice: "auto" as const }
                    : baseParams
            );

            const choice = response.choices[0];
            if (!choice) throw new ProviderResponseError(`${name} returned no choices`);

            const assistantMessage = fromOpenAIMessage(choice.message);
            return {
                content: assistantMessage.content,
                toolCalls: assistantMessage.toolCalls,
                assistantMessage,
            };
        },

        async *stream(messages) {
            logger.debug(`[${id}] stream()`, { model, msgs: messages.length });

            const stream = await client.chat.completions.create({
                model,
                messages: toOpenAIMessages(messages),
                temperature,
                stream: true,
            });

            for await (const chunk of stream) {
                const delta = chunk.choices[0]?.delta?.content;
                if (delta) yield delta;
            }
        },
    };
}

/** Factories — called with live config values so keys are read after .env loads */
export function createOpenAIProvider(apiKey: string, model: string, temperature?: number): LLMProvider {
    return makeOpenAICompatible({ id: "openai", name: "OpenAI", model, apiKey, temperature });
}

export function createDeepSeekProvider(apiKey: string, model: string, temperature?: number): LLMProvider {
    return makeOpenAICompatible({
        id: "deepseek",
        name: "DeepSeek",
        model,
        apiKey,
        baseURL: "https://api.deepseek.com",
        temperature,
    });
}

export function createGroqProvider(apiKey: string, model: string, temperature?: number): LLMProvider {
    return makeOpenAICompatible({
        id: "groq",
        name: "Groq",
        model,
        apiKey,
        baseURL: "https://api.groq.com/openai/v1",
        temperature,
    });
}

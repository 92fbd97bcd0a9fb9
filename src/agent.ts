/**
 * agent.ts — The tool-augmented chat loop
 *
 * One turn:
 *   1. Append the user message and send history + tool specs to the provider
 *   2. If the reply requests tool calls, validate the whole batch, run the
 *      tools in order and append one tool message per call
 *   3. Send the updated history once more, without tools, and return that reply
 *
 * Only one round of tool calls is resolved per turn. Turns on the same agent
 * are serialized; a second chat() waits for the first to finish.
 */

import type { LLMProvider, LLMResponse } from "./providers/types.js";
import type { ToolRegistry } from "./tools/index.js";
import type { AssistantMessage, ChatMessage, ToolMessage } from "./types.js";
import { logger } from "./logger.js";

export interface ToolChatAgentOptions {
    provider: LLMProvider;
    registry: ToolRegistry;
    /** Prepended to every request; never stored in history */
    systemPrompt?: string;
    /** Conversation to continue from */
    history?: readonly ChatMessage[];
}

export class ToolChatAgent {
    private readonly provider: LLMProvider;
    private readonly registry: ToolRegistry;
    private readonly systemPrompt: string | undefined;
    private messages: ChatMessage[];
    private tail: Promise<void> = Promise.resolve();

    constructor(options: ToolChatAgentOptions) {
        this.provider = options.provider;
        this.registry = options.registry;
        this.systemPrompt = options.systemPrompt;
        this.messages = [...(options.history ?? [])];
    }

    /** Snapshot of the conversation so far */
    get history(): readonly ChatMessage[] {
        return [...this.messages];
    }

    reset(): void {
        this.messages = [];
    }

    async chat(message: string): Promise<string> {
        const release = await this.acquire();
        try {
            const first = await this.openTurn(message);
            if (first.toolCalls.length === 0) return first.content ?? "";

            await this.resolveToolCalls(first);

            const final = await this.provider.complete(this.requestMessages());
            return this.appendFinal(final.assistantMessage).content ?? "";
        } finally {
            release();
        }
    }

    /**
     * Like chat(), but the finalizing reply is streamed. Fragments are yielded
     * as they arrive; the assembled reply is appended once the stream ends.
     */
    async *streamChat(message: string): AsyncGenerator<string, void, undefined> {
        const release = await this.acquire();
        try {
            const first = await this.openTurn(message);
            if (first.toolCalls.length === 0) {
                if (first.content) yield first.content;
                return;
            }

            await this.resolveToolCalls(first);

            let text = "";
            for await (const fragment of this.provider.stream(this.requestMessages())) {
                text += fragment;
                yield fragment;
            }
            this.messages.push({ role: "assistant", content: text, toolCalls: [] });
        } finally {
            release();
        }
    }

    private async openTurn(message: string): Promise<LLMResponse> {
        this.messages.push({ role: "user", content: message });

        logger.debug("Requesting completion", {
            provider: this.provider.id,
            messages: this.messages.length,
            tools: this.registry.names(),
        });
        const response = await this.provider.complete(this.requestMessages(), this.registry.specs());
        this.messages.push(response.assistantMessage);
        return response;
    }

    private async resolveToolCalls(response: LLMResponse): Promise<void> {
        // Resolve every call first so a bad request fails before any tool runs
        const calls = response.toolCalls.map((request) => this.registry.resolve(request));

        logger.info(`Executing ${calls.length} tool call(s)`);
        for (const call of calls) {
            const content = await this.registry.invoke(call);
            logger.debug("Tool result", { name: call.request.name, output: content });

            const toolMessage: ToolMessage = {
                role: "tool",
                content,
                name: call.request.name,
                toolCallId: call.request.id,
            };
            this.messages.push(toolMessage);
        }
    }

    private appendFinal(message: AssistantMessage): AssistantMessage {
        if (message.toolCalls.length === 0) {
            this.messages.push(message);
            return message;
        }

        logger.warn("Ignoring tool calls requested after the tool round", {
            tools: message.toolCalls.map((call) => call.name),
        });
        const stripped: AssistantMessage = { role: "assistant", content: message.content, toolCalls: [] };
        this.messages.push(stripped);
        return stripped;
    }

    private requestMessages(): ChatMessage[] {
        return this.systemPrompt
            ? [{ role: "system", content: this.systemPrompt }, ...this.messages]
            : [...this.messages];
    }

    private async acquire(): Promise<() => void> {
        const previous = this.tail;
        let release: () => void = () => {};
        const done = new Promise<void>((resolve) => {
            release = resolve;
        });
        this.tail = previous.then(() => done);
        await previous;
        return release;
    }
}

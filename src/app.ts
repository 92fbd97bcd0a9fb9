/**
 * app.ts — Composition root
 *
 * Everything the program needs is built here from a validated Config, inside
 * the caller's scope. Nothing is constructed at import time.
 */

import { ToolChatAgent } from "./agent.js";
import type { Config } from "./config.js";
import { DEFAULT_SYSTEM_PROMPT } from "./prompts.js";
import { createProvider } from "./providers/registry.js";
import type { LLMProvider } from "./providers/types.js";
import { ToolRegistry } from "./tools/index.js";
import { multiplyTool } from "./tools/multiply.js";

export interface App {
    provider: LLMProvider;
    registry: ToolRegistry;
    agent: ToolChatAgent;
}

export function createApp(config: Config, provider: LLMProvider = createProvider(config)): App {
    const registry = new ToolRegistry([multiplyTool]);
    const agent = new ToolChatAgent({
        provider,
        registry,
        systemPrompt: config.SYSTEM_PROMPT || DEFAULT_SYSTEM_PROMPT,
    });
    return { provider, registry, agent };
}

/**
 * Stream one reply, handing each fragment to write() as soon as it arrives.
 * Returns the full reply text.
 */
export async function streamReply(
    agent: ToolChatAgent,
    prompt: string,
    write: (fragment: string) => void
): Promise<string> {
    let reply = "";
    for await (const fragment of agent.streamChat(prompt)) {
        write(fragment);
        reply += fragment;
    }
    return reply;
}

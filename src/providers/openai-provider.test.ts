import { describe, it, expect, vi, beforeEach } from "vitest";
import { fromOpenAIMessage, makeOpenAICompatible, toOpenAIMessages } from "./openai-provider.js";
import { multiplyTool } from "../tools/multiply.js";
import { ProviderResponseError } from "../errors.js";
import type { ChatMessage } from "../types.js";

const { create, constructorArgs } = vi.hoisted(() => {
    const constructorArgs: unknown[] = [];
    return { create: vi.fn(), constructorArgs };
});

vi.mock("openai", () => ({
    default: class {
        chat = { completions: { create } };
        constructor(options: unknown) {
            constructorArgs.push(options);
        }
    },
}));

async function* chunks(...deltas: (string | null)[]) {
    for (const content of deltas) {
        yield { choices: [{ delta: { content } }] };
    }
}

const CONVERSATION: ChatMessage[] = [
    { role: "system", content: "Be brief." },
    { role: "user", content: "What is 121 * 2?" },
    {
        role: "assistant",
        content: null,
        toolCalls: [{ id: "call_1", name: "multiply", arguments: '{"a":121,"b":2}' }],
    },
    { role: "tool", content: "242", name: "multiply", toolCallId: "call_1" },
];

function makeProvider() {
    return makeOpenAICompatible({
        id: "openai",
        name: "OpenAI",
        model: "gpt-4o-mini",
        apiKey: "test-key",
        temperature: 0,
    });
}

beforeEach(() => {
    create.mockReset();
    constructorArgs.length = 0;
});

describe("toOpenAIMessages", () => {
    it("translates every role to the OpenAI wire shape", () => {
        expect(toOpenAIMessages(CONVERSATION)).toEqual([
            { role: "system", content: "Be brief." },
            { role: "user", content: "What is 121 * 2?" },
            {
                role: "assistant",
                content: null,
                tool_calls: [
                    { id: "call_1", type: "function", function: { name: "multiply", arguments: '{"a":121,"b":2}' } },
                ],
            },
            { role: "tool", tool_call_id: "call_1", content: "242" },
        ]);
    });

    it("omits tool_calls on a plain assistant message", () => {
        expect(toOpenAIMessages([{ role: "assistant", content: "Hi", toolCalls: [] }])).toEqual([
            { role: "assistant", content: "Hi" },
        ]);
    });
});

describe("fromOpenAIMessage", () => {
    it("maps tool calls to requests", () => {
        const message = fromOpenAIMessage({
            role: "assistant",
            content: null,
            refusal: null,
            tool_calls: [{ id: "call_1", type: "function", function: { name: "multiply", arguments: "{}" } }],
        });
        expect(message).toEqual({
            role: "assistant",
            content: null,
            toolCalls: [{ id: "call_1", name: "multiply", arguments: "{}" }],
        });
    });

    it("gives a text reply an empty tool call list", () => {
        expect(fromOpenAIMessage({ role: "assistant", content: "Hello", refusal: null })).toEqual({
            role: "assistant",
            content: "Hello",
            toolCalls: [],
        });
    });
});

describe("makeOpenAICompatible", () => {
    it("passes the key and base URL to the client", () => {
        makeOpenAICompatible({ id: "groq", name: "Groq", model: "m", apiKey: "test-key", baseURL: "http://localhost:9" });
        expect(constructorArgs).toEqual([{ apiKey: "test-key", baseURL: "http://localhost:9" }]);
    });

    it("sends tools with tool_choice auto when tools are given", async () => {
        create.mockResolvedValueOnce({
            choices: [{ message: { role: "assistant", content: "ok", refusal: null } }],
        });

        await makeProvider().complete([{ role: "user", content: "Hi" }], [multiplyTool.spec]);

        expect(create).toHaveBeenCalledWith({
            model: "gpt-4o-mini",
            messages: [{ role: "user", content: "Hi" }],
            temperature: 0,
            tools: [multiplyTool.spec],
            tool_choice: "auto",
        });
    });

    it("omits tools entirely when none are given", async () => {
        create.mockResolvedValueOnce({
            choices: [{ message: { role: "assistant", content: "ok", refusal: null } }],
        });

        const response = await makeProvider().complete([{ role: "user", content: "Hi" }]);

        expect(create).toHaveBeenCalledWith({
            model: "gpt-4o-mini",
            messages: [{ role: "user", content: "Hi" }],
            temperature: 0,
        });
        expect(response).toEqual({
            content: "ok",
            toolCalls: [],
            assistantMessage: { role: "assistant", content: "ok", toolCalls: [] },
        });
    });

    it("returns requested tool calls", async () => {
        create.mockResolvedValueOnce({
            choices: [
                {
                    message: {
                        role: "assistant",
                        content: null,
                        refusal: null,
                        tool_calls: [
                            { id: "call_1", type: "function", function: { name: "multiply", arguments: '{"a":121,"b":2}' } },
                        ],
                    },
                },
            ],
        });

        const response = await makeProvider().complete([{ role: "user", content: "Hi" }], [multiplyTool.spec]);

        expect(response.content).toBeNull();
        expect(response.toolCalls).toEqual([{ id: "call_1", name: "multiply", arguments: '{"a":121,"b":2}' }]);
    });

    it("throws ProviderResponseError when there are no choices", async () => {
        create.mockResolvedValueOnce({ choices: [] });

        await expect(makeProvider().complete([{ role: "user", content: "Hi" }])).rejects.toThrow(
            new ProviderResponseError("OpenAI returned no choices")
        );
    });

    it("propagates client errors unchanged", async () => {
        const failure = new Error("429 Too Many Requests");
        create.mockRejectedValueOnce(failure);

        await expect(makeProvider().complete([{ role: "user", content: "Hi" }])).rejects.toBe(failure);
    });

    it("streams non-empty content deltas in order", async () => {
        create.mockResolvedValueOnce(chunks("Once ", null, "", "upon"));

        const fragments: string[] = [];
        for await (const fragment of makeProvider().stream([{ role: "user", content: "Story" }])) {
            fragments.push(fragment);
        }

        expect(fragments).toEqual(["Once ", "upon"]);
        expect(create).toHaveBeenCalledWith({
            model: "gpt-4o-mini",
            messages: [{ role: "user", content: "Story" }],
            temperature: 0,
            stream: true,
        });
    });
});

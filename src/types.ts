/**
 * types.ts — Conversation data model
 *
 * The agent and its tools speak these shapes only. Providers translate to
 * and from their wire format on each call.
 */

export interface ToolCallRequest {
    readonly id: string;
    readonly name: string;
    readonly arguments: string; // raw JSON string
}

export interface SystemMessage {
    readonly role: "system";
    readonly content: string;
}

export interface UserMessage {
    readonly role: "user";
    readonly content: string;
}

export interface AssistantMessage {
    readonly role: "assistant";
    readonly content: string | null;
    /** Empty when the model replied with plain text */
    readonly toolCalls: readonly ToolCallRequest[];
}

export interface ToolMessage {
    readonly role: "tool";
    readonly content: string;
    /** Name of the tool that produced the result */
    readonly name: string;
    readonly toolCallId: string;
}

export type ChatMessage = SystemMessage | UserMessage | AssistantMessage | ToolMessage;

/**
 * tools/index.ts — Tool registry
 *
 * Tools are exposed to the OpenAI function-calling API. Each tool declares its
 * JSON Schema for parameters, a zod schema that the decoded arguments must
 * satisfy, and an execute() handler.
 *
 * Arguments are validated here, at the boundary, so execute() only ever sees
 * values that passed its schema.
 */

import type { ChatCompletionTool } from "openai/resources/chat/completions";
import type { z } from "zod";
import type { ToolCallRequest } from "../types.js";
import { ArgumentDecodeError, DuplicateToolError, UnknownToolError } from "../errors.js";

export type ToolArgs = Record<string, unknown>;

/** Outcome of validating decoded arguments against a tool's schema */
export type PreparedCall =
    | { readonly ok: true; readonly args: unknown; run(): unknown }
    | { readonly ok: false; readonly reason: string };

export interface ToolDefinition {
    /** The OpenAI function specification */
    spec: ChatCompletionTool;
    /** Validate decoded arguments and bind them to the handler */
    prepare(args: ToolArgs): PreparedCall;
}

export interface TypedToolDefinition<Args> {
    spec: ChatCompletionTool;
    argsSchema: z.ZodType<Args, z.ZodTypeDef, unknown>;
    execute(args: Args): unknown;
}

/** A call whose tool was found and whose arguments decoded cleanly */
export interface ResolvedToolCall {
    readonly request: ToolCallRequest;
    readonly args: unknown;
    run(): unknown;
}

export function defineTool<Args>(tool: TypedToolDefinition<Args>): ToolDefinition {
    return {
        spec: tool.spec,
        prepare(args) {
            const result = tool.argsSchema.safeParse(args);
            if (!result.success) {
                const reason = result.error.issues
                    .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
                    .join("; ");
                return { ok: false, reason };
            }
            const parsed = result.data;
            return { ok: true, args: parsed, run: () => tool.execute(parsed) };
        },
    };
}

export class ToolRegistry {
    private readonly tools = new Map<string, ToolDefinition>();

    constructor(tools: readonly ToolDefinition[] = []) {
        for (const tool of tools) {
            const name = tool.spec.function.name;
            if (this.tools.has(name)) throw new DuplicateToolError(name);
            this.tools.set(name, tool);
        }
    }

    get(name: string): ToolDefinition | undefined {
        return this.tools.get(name);
    }

    names(): string[] {
        return Array.from(this.tools.keys());
    }

    /** Build the array to pass into OpenAI chat completions */
    specs(): ChatCompletionTool[] {
        return Array.from(this.tools.values()).map((t) => t.spec);
    }

    /**
     * Look up the tool and decode the arguments of one call.
     * Throws UnknownToolError or ArgumentDecodeError; never runs the tool.
     */
    resolve(request: ToolCallRequest): ResolvedToolCall {
        const tool = this.tools.get(request.name);
        if (!tool) throw new UnknownToolError(request.name, request.id);
        const prepared = tool.prepare(decodeArguments(request));
        if (!prepared.ok) {
            throw new ArgumentDecodeError(request.name, request.arguments, prepared.reason);
        }
        return { request, args: prepared.args, run: prepared.run };
    }

    /** Run a resolved call. Failures come back as error text, never thrown. */
    async invoke(call: ResolvedToolCall): Promise<string> {
        try {
            return stringifyToolOutput(await call.run());
        } catch (err) {
            const reason = err instanceof Error ? err.message : String(err);
            return `Error executing "${call.request.name}": ${reason}`;
        }
    }
}

function decodeArguments(request: ToolCallRequest): ToolArgs {
    let parsed: unknown;
    try {
        parsed = request.arguments.trim() === "" ? {} : JSON.parse(request.arguments);
    } catch (err) {
        throw new ArgumentDecodeError(request.name, request.arguments, "not valid JSON", err);
    }

    if (!isPlainObject(parsed)) {
        throw new ArgumentDecodeError(request.name, request.arguments, "expected a JSON object");
    }
    return parsed;
}

function isPlainObject(value: unknown): value is ToolArgs {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function stringifyToolOutput(output: unknown): string {
    if (typeof output === "string") return output;
    if (output === undefined || output === null) return "";
    if (typeof output === "object") return JSON.stringify(output);
    return String(output);
}

/**
 * errors.ts — Error taxonomy
 *
 * Remote-service failures are not wrapped here: they reach the caller as the
 * client library threw them.
 */

export class AgentError extends Error {
    override name: string;
    override readonly cause?: unknown;

    constructor(message: string, cause?: unknown) {
        super(message);
        this.name = this.constructor.name;
        this.cause = cause;
    }
}

/** The model asked for a tool that is not in the registry */
export class UnknownToolError extends AgentError {
    readonly toolName: string;
    readonly callId: string;

    constructor(toolName: string, callId: string) {
        super(`Unknown tool "${toolName}" (call ${callId})`);
        this.toolName = toolName;
        this.callId = callId;
    }
}

/** Tool-call arguments could not be decoded into the tool's parameters */
export class ArgumentDecodeError extends AgentError {
    readonly toolName: string;
    readonly rawArguments: string;

    constructor(toolName: string, rawArguments: string, reason: string, cause?: unknown) {
        super(`Could not decode arguments for "${toolName}": ${reason}`, cause);
        this.toolName = toolName;
        this.rawArguments = rawArguments;
    }
}

export class DuplicateToolError extends AgentError {
    constructor(toolName: string) {
        super(`Tool "${toolName}" is registered more than once`);
    }
}

export class ProviderResponseError extends AgentError {}

export class ConfigError extends AgentError {
    readonly issues: readonly string[];

    constructor(message: string, issues: readonly string[] = []) {
        super(message);
        this.issues = issues;
    }
}

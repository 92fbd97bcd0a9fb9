/**
 * config.ts — Environment validation using Zod
 *
 * The entry point loads .env (dotenv) and calls loadConfig() once; nothing
 * reads process.env at import time. Secrets live in .env only.
 */

import { z } from "zod";
import { ConfigError } from "./errors.js";

const envSchema = z.object({
    /** Which OpenAI-compatible endpoint to talk to */
    LLM_PROVIDER: z.enum(["openai", "groq", "deepseek"]).default("openai"),

    /** Model name; empty means the provider's default */
    LLM_MODEL: z.string().default(""),

    /** Sampling temperature */
    LLM_TEMPERATURE: z
        .string()
        .regex(/^\d+(\.\d+)?$/, "LLM_TEMPERATURE must be a non-negative number")
        .transform(Number)
        .default("0"),

    /** OpenAI API key */
    OPENAI_API_KEY: z.string().default(""),

    /** Groq API key */
    GROQ_API_KEY: z.string().default(""),

    /** DeepSeek API key */
    DEEPSEEK_API_KEY: z.string().default(""),

    /** System prompt override; empty means the built-in one */
    SYSTEM_PROMPT: z.string().default(""),

    /** Log level */
    LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
});

export type Config = z.infer<typeof envSchema>;
export type ProviderId = Config["LLM_PROVIDER"];

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
    const result = envSchema.safeParse(env);
    if (!result.success) {
        const issues = result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
        throw new ConfigError("Invalid environment configuration", issues);
    }
    return result.data;
}

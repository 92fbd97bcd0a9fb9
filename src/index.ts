#!/usr/bin/env node
/**
 * index.ts — Entry point
 *
 * Loads .env, validates config, builds the agent and streams one reply to
 * stdout. The prompt comes from the command line, or the demo prompt.
 */

import "dotenv/config";
import { createApp, streamReply } from "./app.js";
import { loadConfig } from "./config.js";
import { ConfigError } from "./errors.js";
import { logger, setLogLevel } from "./logger.js";
import { DEMO_PROMPT } from "./prompts.js";
import { providerLabel } from "./providers/registry.js";

async function main() {
    const config = loadConfig();
    setLogLevel(config.LOG_LEVEL);

    const { agent, provider, registry } = createApp(config);
    logger.info("Agent ready", { llm: providerLabel(provider), tools: registry.names() });

    const prompt = process.argv.slice(2).join(" ").trim() || DEMO_PROMPT;
    await streamReply(agent, prompt, (fragment) => process.stdout.write(fragment));
    process.stdout.write("\n");
}

main().catch((err: unknown) => {
    if (err instanceof ConfigError) {
        console.error("❌ Invalid environment configuration:\n");
        for (const issue of err.issues) console.error(`  • ${issue}`);
        console.error("\nCopy .env.example to .env and fill in your values.\n");
    } else {
        logger.error("Fatal error", { err: err instanceof Error ? err.stack ?? err.message : String(err) });
    }
    process.exit(1);
});

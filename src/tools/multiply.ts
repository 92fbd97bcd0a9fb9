/**
 * tools/multiply.ts — Integer multiplication.
 *
 * The one tool registered by the entry point; it gives the model something
 * concrete to call so the tool round of the chat loop is exercised.
 */

import { z } from "zod";
import { defineTool } from "./index.js";

const multiplyArgs = z.object({
    a: z.number().int().safe(),
    b: z.number().int().safe(),
});

export const multiplyTool = defineTool({
    spec: {
        type: "function",
        function: {
            name: "multiply",
            description: "Multiplies two integers and returns the exact result integer.",
            parameters: {
                type: "object",
                properties: {
                    a: { type: "integer", description: "The first factor, within ±(2^53 - 1)." },
                    b: { type: "integer", description: "The second factor, within ±(2^53 - 1)." },
                },
                required: ["a", "b"],
                additionalProperties: false,
            },
        },
    },

    argsSchema: multiplyArgs,

    // Factors are exact as doubles; the product may not be
    execute({ a, b }) {
        return BigInt(a) * BigInt(b);
    },
});

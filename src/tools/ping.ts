/**
 * Ping tool - liveness check that echoes a message
 */

import type { ToolDefinition } from "./index.js";

export interface PingInput {
    message?: string;
}

export interface PingOutput {
    ok: true;
    echo: string;
    server: string;
    timestamp: string;
}

export const SERVER_NAME = "place-grid-mcp";

/**
 * Echoes the message (default "pong") with the server name and an ISO timestamp
 */
export function pingHandler(input: PingInput = {}): PingOutput {
    return {
        ok: true,
        echo: input.message || "pong",
        server: SERVER_NAME,
        timestamp: new Date().toISOString(),
    };
}

/**
 * Ping tool definition for MCP
 */
export const pingTool = {
    name: "ping",
    description: "Liveness check that echoes a message with the server name and a timestamp",
    inputSchema: {
        type: "object",
        properties: {
            message: {
                type: "string",
                description: "Optional message to echo (default: 'pong')",
            },
        },
    },
} satisfies ToolDefinition;

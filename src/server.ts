import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import type { Transport } from "@modelcontextprotocol/sdk/shared/transport.js";
import {
    CallToolRequestSchema,
    ErrorCode,
    ListToolsRequestSchema,
    McpError,
} from "@modelcontextprotocol/sdk/types.js";
import { SERVER_NAME } from "./tools/ping.js";
import { findTool, tools } from "./tools/index.js";

function isTestEnvironment(): boolean {
    return process.env.NODE_ENV === "test" || typeof process.env.VITEST !== "undefined";
}

/**
 * Place Grid MCP Server
 * Palette-constrained placement grids over stdio
 */
export class PlaceGridServer {
    private server: Server;

    constructor() {
        this.server = new Server(
            {
                name: SERVER_NAME,
                version: "1.0.0",
            },
            {
                capabilities: {
                    tools: {},
                },
            }
        );

        this.setupToolHandlers();

        // Error handling
        this.server.onerror = (error) => console.error("[MCP Error]", error);

        if (!isTestEnvironment()) {
            process.on("SIGINT", async () => {
                await this.server.close();
                process.exit(0);
            });
        }
    }

    private setupToolHandlers() {
        this.server.setRequestHandler(ListToolsRequestSchema, async () => ({
            tools,
        }));

        this.server.setRequestHandler(CallToolRequestSchema, async (request) => {
            const toolName = request.params.name;
            const tool = findTool(toolName);
            if (!tool) {
                throw new McpError(ErrorCode.MethodNotFound, `Unknown tool: ${toolName}`);
            }

            const prepared = tool.prepare(request.params.arguments);
            if (!prepared.success) {
                throw new McpError(ErrorCode.InvalidParams, prepared.issue);
            }

            try {
                const result = await prepared.call();
                return {
                    content: [
                        {
                            type: "text",
                            text: JSON.stringify(result, null, 2),
                        },
                    ],
                };
            } catch (error) {
                throw new McpError(
                    ErrorCode.InternalError,
                    `Failed to run ${toolName}: ${error instanceof Error ? error.message : "Unknown error"}`
                );
            }
        });
    }

    async run(transport?: Transport) {
        const serverTransport = transport ?? new StdioServerTransport();
        await this.server.connect(serverTransport);
        // Only log when using stdio transport and not in test environment
        if (!transport && !isTestEnvironment()) {
            console.error(`${SERVER_NAME} running on stdio`);
        }
    }

    getServer(): Server {
        return this.server;
    }
}

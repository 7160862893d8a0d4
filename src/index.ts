#!/usr/bin/env node
import { PlaceGridServer } from "./server.js";

const server = new PlaceGridServer();
server.run().catch((error: unknown) => {
    console.error("[MCP Error]", error);
    process.exit(1);
});

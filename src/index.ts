#!/usr/bin/env node

import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from "@modelcontextprotocol/sdk/types.js";
import { readFileSync } from "fs";
import { fileURLToPath } from "url";
import { dirname, join } from "path";
import { loadConfig, configExists, ensureDirectories } from "./config/index.js";
import { AppContext, createContext } from "./context.js";
import { TOOLS } from "./tools/definitions.js";
import { handleToolCall } from "./tools/handlers.js";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const packageJson: { version: string } = JSON.parse(
  readFileSync(join(__dirname, "..", "package.json"), "utf-8")
);

class ContactNotesServer {
  private server: Server;
  private context: AppContext;

  private constructor(context: AppContext) {
    this.context = context;

    this.server = new Server(
      {
        name: "contact-notes",
        version: packageJson.version,
      },
      {
        capabilities: {
          tools: {},
        },
      }
    );

    this.setupHandlers();
  }

  static create(): ContactNotesServer {
    if (!configExists()) {
      console.error("No configuration found. Run 'contact-notes init' first.");
      process.exit(1);
    }

    const config = loadConfig();
    ensureDirectories(config);

    return new ContactNotesServer(createContext(config));
  }

  private setupHandlers(): void {
    this.server.setRequestHandler(ListToolsRequestSchema, async () => ({
      tools: TOOLS,
    }));

    this.server.setRequestHandler(CallToolRequestSchema, async (request) => {
      const { name, arguments: args } = request.params;
      return handleToolCall(this.context, name, args);
    });
  }

  async run(): Promise<void> {
    const transport = new StdioServerTransport();
    await this.server.connect(transport);
    this.context.logger.info("Contact Notes MCP server running on stdio");
  }
}

async function main(): Promise<void> {
  await ContactNotesServer.create().run();
}

main().catch((error) => {
  console.error("Failed to start MCP server:", error);
  process.exit(1);
});

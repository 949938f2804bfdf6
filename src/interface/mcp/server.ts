#!/usr/bin/env node
// src/interface/mcp/server.ts

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
    CallToolRequestSchema,
    ListToolsRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';
import { CONFIG } from '../../config/config';
import { createEngine } from '../../core/engine';
import { OperationJournal } from '../../core/journal/OperationJournal';
import { Logger } from '../../core/logging/Logger';
import { ElementModule } from '../../core/modules/ElementModule';
import { InMemoryModel } from '../../core/resource/InMemoryModel';
import { closeDatabase, initDatabase } from '../../infrastructure/database';
import { buildToolDefinitions, callTool } from './tools';

async function main(): Promise<void> {
    const journal = CONFIG.JOURNAL.ENABLED ? new OperationJournal(initDatabase()) : undefined;
    const model = new InMemoryModel('Session Model');
    const engine = await createEngine(model, [new ElementModule()], { journal });
    const tools = buildToolDefinitions(engine.registry);

    const server = new Server(
        {
            name: CONFIG.SERVER.NAME,
            version: CONFIG.SERVER.VERSION
        },
        {
            capabilities: {
                tools: {},
            },
        }
    );

    server.setRequestHandler(ListToolsRequestSchema, async () => ({ tools }));

    server.setRequestHandler(CallToolRequestSchema, async (request) => {
        const { name, arguments: args } = request.params;
        return callTool(engine.dispatcher, name, args);
    });

    server.onerror = (error: Error) => {
        Logger.error('MCP', '[MCP Server Error]', error);
    };

    const cleanup = async () => {
        Logger.info('MCP', 'Shutting down gracefully...');
        await engine.modules.shutdown();
        await server.close();
        closeDatabase();
        process.exit(0);
    };
    const onSignal = () => {
        cleanup().catch((error) => {
            Logger.error('MCP', 'Shutdown failed:', error);
            process.exit(1);
        });
    };
    process.on('SIGINT', onSignal);
    process.on('SIGTERM', onSignal);

    const transport = new StdioServerTransport();
    await server.connect(transport);
    Logger.info('MCP', `${CONFIG.SERVER.NAME} running on stdio`, { tools: tools.length });
}

main().catch((error) => {
    Logger.error('MCP', 'Fatal error in main():', error);
    process.exit(1);
});

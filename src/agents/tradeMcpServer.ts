import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { CallToolRequestSchema, ListToolsRequestSchema } from '@modelcontextprotocol/sdk/types.js';
import type { Logger } from '../core/logger.js';
import type { TradeTool } from '../tools/tradeTool.js';
import type { WalletInfoTool } from '../tools/walletInfoTool.js';

interface ToolInputSchema {
  type: 'object';
  properties: Record<string, object>;
  required?: string[];
}

interface AgentTool {
  readonly name: string;
  readonly description: string;
  invoke(input: unknown): Promise<string>;
}

export const TRADE_TOOL_INPUT_SCHEMA: ToolInputSchema = {
  type: 'object',
  properties: {
    action: { type: 'string', enum: ['BUY', 'SELL'], description: 'BUY spends the quote token for SOL, SELL spends SOL' },
    amount: { type: 'number', exclusiveMinimum: 0, description: 'Amount of SOL to trade, e.g. 0.01' },
    dryRun: { type: 'boolean', default: true, description: 'Quote only, no transaction is sent' }
  },
  required: ['action', 'amount']
};

export const WALLET_INFO_INPUT_SCHEMA: ToolInputSchema = { type: 'object', properties: {} };

export interface TradeMcpTools {
  trade: TradeTool;
  walletInfo: WalletInfoTool;
}

/** MCP server exposing the trade and wallet-balance tools to agents; connect it to any transport. */
export const createTradeMcpServer = (tools: TradeMcpTools, logger: Logger, version = '0.1.0'): Server => {
  const server = new Server({ name: 'swap-execution-engine', version }, { capabilities: { tools: {} } });

  const registered: Array<{ tool: AgentTool; inputSchema: ToolInputSchema }> = [
    { tool: tools.trade, inputSchema: TRADE_TOOL_INPUT_SCHEMA },
    { tool: tools.walletInfo, inputSchema: WALLET_INFO_INPUT_SCHEMA }
  ];

  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: registered.map(({ tool, inputSchema }) => ({ name: tool.name, description: tool.description, inputSchema }))
  }));

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;
    const entry = registered.find((r) => r.tool.name === name);
    if (!entry) {
      logger.warn('unknown tool requested', { tool: name });
      return { content: [{ type: 'text' as const, text: `Unknown tool: ${name}` }], isError: true };
    }
    const text = await entry.tool.invoke(args ?? {});
    return { content: [{ type: 'text' as const, text }] };
  });

  return server;
};

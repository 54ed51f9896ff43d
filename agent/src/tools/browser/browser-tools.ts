/**
 * Browser tools, forwarded to the puppeteer MCP server as `tools/call`.
 *
 * The schemas here only shape arguments for the model; the server validates
 * them again. Nothing is sent unless the session's adapter is `ready`.
 */

import { z } from 'zod';
import type { ToolContext, ToolDefinition } from '../types.js';
import { defineTool } from '../define-tool.js';
import { ToolError, type ToolErrorKind } from '../errors.js';
import { ProtocolError, type ProtocolErrorKind } from '../../protocol/protocol-adapter.js';

export const BROWSER_TOOL_PREFIX = 'mcp__puppeteer__';

const contentBlockSchema = z
  .object({
    type: z.string(),
    text: z.string().optional(),
    mimeType: z.string().optional(),
  })
  .passthrough();

const callToolResultSchema = z
  .object({
    content: z.array(contentBlockSchema).default([]),
    isError: z.boolean().optional(),
  })
  .passthrough();

const PROTOCOL_TO_TOOL_KIND: Record<ProtocolErrorKind, ToolErrorKind> = {
  Timeout: 'Timeout',
  Disconnected: 'Disconnected',
  Cancelled: 'Cancelled',
  Unavailable: 'Unavailable',
  MalformedResponse: 'MalformedResponse',
  StartupFailed: 'ExecutionFailed',
  RemoteError: 'ExecutionFailed',
};

export function fromProtocolError(err: ProtocolError): ToolError {
  return new ToolError(PROTOCOL_TO_TOOL_KIND[err.kind], err.message, {
    ...(err.code !== undefined && { code: err.code }),
  });
}

/** Join text blocks; images become a `[Image: mime]` placeholder. */
export function flattenContent(blocks: z.infer<typeof contentBlockSchema>[]): string {
  return blocks
    .map((block) => {
      if (block.type === 'text') return block.text ?? '';
      if (block.type === 'image') return `[Image: ${block.mimeType ?? 'image/png'}]`;
      return `[${block.type} content]`;
    })
    .join('\n');
}

async function callBrowser(name: string, args: Record<string, unknown>, ctx: ToolContext): Promise<string> {
  const adapter = ctx.browser();
  if (!adapter || adapter.state !== 'ready') {
    const state = adapter ? ` (browser server is ${adapter.state})` : '';
    throw new ToolError('Unavailable', `Browser tools are unavailable${state}`);
  }

  let raw: unknown;
  try {
    raw = await adapter.call('tools/call', { name, arguments: args });
  } catch (err) {
    throw err instanceof ProtocolError ? fromProtocolError(err) : err;
  }

  const parsed = callToolResultSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ToolError('MalformedResponse', `${name} returned an invalid tools/call result`);
  }
  const text = flattenContent(parsed.data.content);
  if (parsed.data.isError) {
    throw new ToolError('ExecutionFailed', text || `${name} failed`);
  }
  return text || '(no output)';
}

function browserTool(name: string, description: string, schema: z.ZodObject<z.ZodRawShape>): ToolDefinition {
  return defineTool({
    name,
    description,
    category: 'browser',
    schema,
    handle: (args, ctx) => callBrowser(name, args, ctx),
  });
}

export const browserTools: ToolDefinition[] = [
  browserTool(
    'puppeteer_connect_active_tab',
    'Connect to an already running Chrome started with remote debugging. Use this before other browser tools when testing an app in an existing tab.',
    z.object({
      targetUrl: z.string().optional().describe('Optional URL of the target tab to connect to'),
      debugPort: z.number().int().min(1).optional().describe('Chrome debugging port (default: 9222)'),
    })
  ),
  browserTool(
    'puppeteer_navigate',
    'Navigate the browser to a URL.',
    z.object({
      url: z.string().min(1).describe('URL to navigate to'),
    })
  ),
  browserTool(
    'puppeteer_screenshot',
    'Take a screenshot of the current page or of one element.',
    z.object({
      name: z.string().min(1).describe('Name for the screenshot file'),
      selector: z.string().optional().describe('Optional CSS selector for element to screenshot'),
      width: z.number().int().min(1).optional().describe('Width in pixels (default: 800)'),
      height: z.number().int().min(1).optional().describe('Height in pixels (default: 600)'),
    })
  ),
  browserTool(
    'puppeteer_click',
    'Click an element on the page using a CSS selector.',
    z.object({
      selector: z.string().min(1).describe('CSS selector for element to click'),
    })
  ),
  browserTool(
    'puppeteer_fill',
    'Fill out an input field with text.',
    z.object({
      selector: z.string().min(1).describe('CSS selector for the input field'),
      value: z.string().describe('Text value to fill in'),
    })
  ),
  browserTool(
    'puppeteer_select',
    'Select an option from a dropdown/select element.',
    z.object({
      selector: z.string().min(1).describe('CSS selector for the select element'),
      value: z.string().describe('Value of the option to select'),
    })
  ),
  browserTool(
    'puppeteer_hover',
    'Hover the mouse over an element on the page.',
    z.object({
      selector: z.string().min(1).describe('CSS selector for element to hover over'),
    })
  ),
  browserTool(
    'puppeteer_evaluate',
    'Execute JavaScript in the page and return the result. Use for inspecting page state, not for driving interactions.',
    z.object({
      script: z.string().min(1).describe('JavaScript code to execute'),
    })
  ),
];

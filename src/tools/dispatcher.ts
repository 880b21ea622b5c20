import { ZodError } from 'zod';
import { loadConfig } from '../config.js';
import { internalError, invalidParams, McpError, RinexDecodeError } from '../shared/index.js';
import { logServer } from '../utils/stdioHygiene.js';
import type { ToolExposureMode, ToolHandlerContext } from './registry.js';
import { getToolSpec, isToolExposed } from './registry.js';

export type ToolCallContext = Partial<ToolHandlerContext>;

export type ToolResponse = {
  content: { type: 'text'; text: string }[];
  isError?: boolean;
};

function parseToolArgs<T>(toolName: string, schema: { parse: (input: unknown) => T }, args: unknown): T {
  try {
    return schema.parse(args);
  } catch (err) {
    if (err instanceof ZodError) {
      throw invalidParams(`Invalid parameters for ${toolName}`, {
        issues: err.issues,
      });
    }
    throw err;
  }
}

function toToolError(err: unknown): McpError | RinexDecodeError {
  if (err instanceof McpError || err instanceof RinexDecodeError) return err;
  logServer('Unexpected tool error:', err);
  return internalError(err instanceof Error ? err.message : String(err));
}

function formatToolError(err: unknown): ToolResponse & { isError: true } {
  const { code, message, data } = toToolError(err);
  const hasData = typeof data === 'object' && data !== null && Object.keys(data).length > 0;
  const payload = {
    error: {
      code,
      message,
      ...(hasData ? { data } : {}),
    },
  };

  return {
    content: [{ type: 'text', text: JSON.stringify(payload, null, 2) }],
    isError: true,
  };
}

export async function handleToolCall(
  name: string,
  args: Record<string, unknown>,
  mode: ToolExposureMode = 'standard',
  ctx: ToolCallContext = {}
): Promise<ToolResponse> {
  try {
    const spec = getToolSpec(name);
    if (!spec) {
      throw invalidParams(`Unknown tool: ${name}`);
    }
    if (!isToolExposed(spec, mode)) {
      throw invalidParams(`Tool not exposed in ${mode} mode: ${name}`);
    }

    const parsedArgs = parseToolArgs(name, spec.zodSchema, args);
    const result = await spec.handler(parsedArgs, { config: ctx.config ?? loadConfig() });
    return { content: [{ type: 'text', text: JSON.stringify(result, null, 2) }] };
  } catch (err) {
    return formatToolError(err);
  }
}

import { z, toJSONSchema } from 'zod';

/** MCP wants a plain draft-07 object schema without $schema or $defs. */
export function zodToMcpInputSchema(schema: z.ZodType): Record<string, unknown> {
  const jsonSchema = toJSONSchema(schema, {
    target: 'draft-7',
    reused: 'inline',
    unrepresentable: 'any',
    io: 'input',
  });

  // eslint-disable-next-line @typescript-eslint/no-unused-vars
  const { $schema, $defs, ...rest } = jsonSchema;
  const normalized: Record<string, unknown> = { ...rest };

  const type = normalized.type;
  if (type === undefined) {
    normalized.type = 'object';
    return normalized;
  }
  if (type !== 'object') {
    throw new Error(`Invalid MCP inputSchema: expected top-level type "object", got ${JSON.stringify(type)}`);
  }

  return normalized;
}

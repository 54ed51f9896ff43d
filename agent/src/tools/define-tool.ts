import type { z } from 'zod';
import { ToolError } from './errors.js';
import { zodToJsonSchema } from './schema-converter.js';
import type { ToolDefinition, ToolSpec } from './types.js';

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

/**
 * Turn a zod-typed tool spec into a registry definition. Arguments are parsed
 * before the handler sees them; a parse failure is `InvalidArguments`.
 */
export function defineTool<S extends z.ZodObject<z.ZodRawShape>>(spec: ToolSpec<S>): ToolDefinition {
  return {
    name: spec.name,
    description: spec.description,
    category: spec.category,
    parameters: zodToJsonSchema(spec.schema),
    async run(params, ctx) {
      const parsed = spec.schema.safeParse(params);
      if (!parsed.success) {
        throw new ToolError('InvalidArguments', `Invalid arguments for ${spec.name}: ${describeIssues(parsed.error)}`);
      }
      return spec.handle(parsed.data, ctx);
    },
  };
}

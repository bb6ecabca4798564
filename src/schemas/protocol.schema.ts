import { z } from 'zod';

export const ProtocolRequestSchema = z.object({
  id: z.union([z.string(), z.number(), z.null()]).default(null),
  method: z.string(),
  params: z.record(z.unknown()).default({}),
});

export const ToolCallParamsSchema = z.object({
  name: z.string(),
  arguments: z.record(z.unknown()).default({}),
});

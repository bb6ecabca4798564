import { z } from 'zod';

export const InteractionSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('click'), selector: z.string().min(1) }),
  z.object({ type: z.literal('fill'), selector: z.string().min(1), value: z.string() }),
  z.object({ type: z.literal('wait'), duration: z.number().int().nonnegative().default(1000) }),
  z.object({
    type: z.literal('scroll'),
    direction: z.enum(['top', 'bottom', 'up', 'down']).default('bottom'),
  }),
]);

export const JobOptionsSchema = z
  .object({
    pagination: z.boolean().default(false),
    max_pages: z.number().int().positive().default(1),
  })
  .default({});

export const JobConfigSchema = z.object({
  url: z.string().url(),
  schema: z.record(z.unknown()),
  interactions: z.array(InteractionSchema).default([]),
  options: JobOptionsSchema,
});

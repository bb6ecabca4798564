import { z } from 'zod';

export const SessionInputSchema = z.object({
  session_id: z
    .string()
    .nullish()
    .describe('Existing session identifier. Leave empty to start a new session.'),
});

export const NavigateInputSchema = SessionInputSchema.extend({
  url: z.string().describe('Destination URL (http or https).'),
});

export const ScreenshotInputSchema = SessionInputSchema.extend({
  mode: z
    .enum(['viewport', 'fullpage'])
    .default('viewport')
    .describe("Screenshot mode: 'viewport' or 'fullpage'."),
});

export const ExtractLinksInputSchema = SessionInputSchema.extend({
  filter_contains: z
    .string()
    .nullish()
    .describe('Only keep links containing this text (case-insensitive).'),
});

export const FillInputSchema = SessionInputSchema.extend({
  selector: z.string().min(1).describe('CSS selector targeting the field to fill.'),
  value: z.string().describe('Value to type into the element.'),
});

export const ClickInputSchema = SessionInputSchema.extend({
  selector: z.string().min(1).describe('CSS selector targeting the element to click.'),
});

export const GetHtmlInputSchema = SessionInputSchema;

export type SessionInput = z.infer<typeof SessionInputSchema>;

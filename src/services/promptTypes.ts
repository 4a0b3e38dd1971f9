import { z } from 'zod';

export const PromptConfigEntrySchema = z.object({
  inputs: z.array(z.string()),
  path: z.string(),
});

export const FullPromptsConfigSchema = z.object({
  prompts: z.record(z.record(PromptConfigEntrySchema)),
});

export type PromptConfigEntry = z.infer<typeof PromptConfigEntrySchema>;

export type AgentPromptsConfig = Record<string, PromptConfigEntry>;

export type FullPromptsConfig = z.infer<typeof FullPromptsConfigSchema>;

import { z } from 'zod';

const AuthConfigSchema = z.discriminatedUnion('method', [
  z.object({ method: z.literal('api_key'), apiKey: z.string().min(1) }),
  z.object({ method: z.literal('env'), envVar: z.string().min(1) }),
  z.object({ method: z.literal('none') }),
]);

export const GatewayConfigSchema = z.object({
  provider: z
    .enum(['ollama', 'openai', 'anthropic', 'google', 'mistral', 'deepseek', 'groq', 'xai', 'custom'])
    .default('ollama'),
  baseUrl: z.string().url().optional(),
  auth: AuthConfigSchema.optional(),
  timeout: z.number().positive().default(300),
});

export const AdvisorSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  model: z.string().min(1),
  prompt: z.string().min(1),
  description: z.string().optional(),
});

export const CouncilConfigSchema = z
  .object({
    gateway: GatewayConfigSchema.default({}),
    advisors: z.array(AdvisorSchema).default([]),
    chairmanModel: z.string().min(1),
    titleModel: z.string().min(1).optional(),
    personasDir: z.string().optional(),
    dataDir: z.string().optional(),
  })
  .superRefine((cfg, ctx) => {
    const ids = new Set<string>();
    const names = new Set<string>();
    cfg.advisors.forEach((a, i) => {
      if (ids.has(a.id)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['advisors', i, 'id'], message: `Duplicate advisor id "${a.id}"` });
      }
      if (names.has(a.name)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['advisors', i, 'name'], message: `Duplicate advisor name "${a.name}"` });
      }
      ids.add(a.id);
      names.add(a.name);
    });
  });

export type CouncilConfigInput = z.input<typeof CouncilConfigSchema>;
export type CouncilConfigFile = z.output<typeof CouncilConfigSchema>;

import { z } from 'zod';

export const ReporterConfigSchema = z.object({
  display: z.boolean().default(true),
  prefix: z.string().min(1).default('[maybe]'),
});

export type ReporterConfig = z.infer<typeof ReporterConfigSchema>;

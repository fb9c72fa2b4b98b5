import { z } from 'zod';

const logLevelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);

export const resolverSettingsSchema = z.object({
  productionDatabase: z.string().min(1),
  stagingDatabase: z.string().min(1).optional(),
  historyFolder: z.string().min(1).optional(),
  keepHistory: z.boolean().default(true),
  solverCommand: z.string().min(1).optional(),
  logLevel: z.string().pipe(logLevelSchema).default('info'),
});

export type ResolverSettings = z.input<typeof resolverSettingsSchema>;

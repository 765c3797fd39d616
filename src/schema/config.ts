import { z } from 'zod';

import { SERVER, TIMEOUTS } from '../config/defaults.js';

// ── Server config file ──────────────────────────────────────

export const serverConfigSchema = z.object({
  port: z.number().int().min(0).max(65_535).optional().default(SERVER.PORT),
  host: z.string().min(1).optional().default(SERVER.HOST),
  headless: z.boolean().optional().default(false),
  startUrl: z.string().url().optional().default(SERVER.START_URL),
  searchEngineUrl: z.string().url().optional().default(SERVER.SEARCH_ENGINE_URL),
  sweepIntervalSeconds: z
    .number()
    .positive()
    .optional()
    .default(TIMEOUTS.SWEEP_INTERVAL / 1000),
  provider: z.enum(['anthropic', 'openai', 'mock']).optional(),
  model: z.string().min(1).optional(),
});

export type ServerConfig = z.infer<typeof serverConfigSchema>;

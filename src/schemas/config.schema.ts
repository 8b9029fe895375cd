import { z } from 'zod';

export const LogLevel = z.enum(['debug', 'info', 'warn', 'error', 'silent']);

export type LogLevel = z.infer<typeof LogLevel>;

export const DEFAULT_API_BASE_URL = 'https://endoflife.date/api';

export const DEFAULT_TIMEOUT_MS = 30_000;

export const ScanConfig = z.object({
  apiBaseUrl: z
    .string()
    .url()
    .default(DEFAULT_API_BASE_URL)
    .transform((url) => url.replace(/\/+$/, '')),
  timeoutMs: z.coerce.number().int().positive().default(DEFAULT_TIMEOUT_MS),
  inputDir: z.string().min(1).default('input'),
  outputDir: z.string().min(1).default('output'),
  logLevel: LogLevel.default('info'),
});

export type ScanConfig = z.infer<typeof ScanConfig>;

import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

export const terminalEnvSchema = z.object({
  TERMINAL_API_KEY: z.string().min(1, 'TERMINAL_API_KEY is required'),
  TERMINAL_API_SECRET: z.string().min(1, 'TERMINAL_API_SECRET is required'),
  TERMINAL_BASE_URL: z.string().url().default('http://127.0.0.1:8228'),
  RECV_WINDOW_MS: z.coerce.number().int().positive().default(5000)
});

export type TerminalEnv = z.infer<typeof terminalEnvSchema>;

export function loadTerminalEnv(env: NodeJS.ProcessEnv = process.env): TerminalEnv {
  const parsed = terminalEnvSchema.safeParse(env);

  if (!parsed.success) {
    throw new Error(`Invalid terminal environment configuration: ${parsed.error.message}`);
  }

  return parsed.data;
}

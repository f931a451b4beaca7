import { z } from 'zod';

export const DEFAULT_PORT = 3000;

export const configSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  // Anything but a plain decimal in 1..65535 falls back to the default port.
  PORT: z
    .string()
    .regex(/^\d+$/)
    .pipe(z.coerce.number().int().min(1).max(65535))
    .catch(DEFAULT_PORT),
  CORRELATION_ID_HEADER: z.string().min(1).default('x-correlation-id'),
});

export type AppConfig = z.infer<typeof configSchema>;

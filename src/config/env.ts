import 'dotenv/config';
import { z } from 'zod';

const envSchema = z.object({
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
  // Any value is accepted; only 'development' changes behaviour (pretty logs)
  NODE_ENV: z.string().min(1).default('production'),

  // Native HTML -> PDF converter: auto-detect, disable, or pin one
  RESUME_PDF_BACKEND: z.enum(['auto', 'none', 'weasyprint', 'wkhtmltopdf']).default('auto'),

  // Extra theme directory scanned after the bundled themes (optional)
  RESUME_THEMES_DIR: z.string().min(1).optional(),
});

export type Env = z.infer<typeof envSchema>;
export type PdfBackendSetting = Env['RESUME_PDF_BACKEND'];

function loadEnv(): Env {
  const result = envSchema.safeParse(process.env);
  if (!result.success) {
    console.error('Invalid environment variables:', result.error.flatten().fieldErrors);
    process.exit(1);
  }
  return result.data;
}

export const env = loadEnv();

import type { CalculatorConfig, LogLevel, OutputFormat, PointingModel } from '@backend/types'
import { z } from 'zod'

const envSchema = z.object({
  // Earth model for look angles: 'ellipsoidal' (default) or 'spherical'
  POINTING_MODEL: z.enum(['ellipsoidal', 'spherical']).default('ellipsoidal'),

  // Coax line between LNB and receiver (RG6 by default)
  COAX_LOSS_DB_PER_FT: z.coerce.number().positive().default(0.08),
  COAX_LINE_TEMP_K: z.coerce.number().positive().default(290),

  OUTPUT_FORMAT: z.enum(['text', 'json']).default('text'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
})

function parseEnv(): z.infer<typeof envSchema> {
  const result = envSchema.safeParse(process.env)

  if (!result.success) {
    const errors = result.error.errors.map((e) => `  ${e.path.join('.')}: ${e.message}`).join('\n')
    throw new Error(`Environment validation failed:\n${errors}`)
  }

  return result.data
}

export function loadConfig(): CalculatorConfig {
  const env = parseEnv()

  return {
    pointingModel: env.POINTING_MODEL satisfies PointingModel,
    coax: {
      lossDbPerFt: env.COAX_LOSS_DB_PER_FT,
      lineTempK: env.COAX_LINE_TEMP_K,
    },
    output: env.OUTPUT_FORMAT satisfies OutputFormat,
    logLevel: env.LOG_LEVEL satisfies LogLevel,
  }
}

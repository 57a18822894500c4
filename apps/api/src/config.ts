import { z } from 'zod'

const optionalText = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value ? value : undefined))

const envSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(3001),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  DATABASE_URL: z.string().trim().min(1, 'DATABASE_URL environment variable is not set'),
  DATABASE_CLIENT: z.enum(['pg', 'better-sqlite3']).default('pg'),
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']).default('info'),
  LOG_DIR: optionalText,
  LOG_REQUEST_BODY: z.enum(['true', 'false']).default('false').transform((value) => value === 'true'),
  MAX_UPLOAD_BYTES: z.coerce.number().int().positive().default(50 * 1024 * 1024),
  SELLER_NAME: z.string().trim().default('Courier Services'),
  SELLER_ADDRESS: optionalText,
  SELLER_GSTIN: optionalText,
  SELLER_PAN: optionalText,
  SELLER_STATE: optionalText,
  SELLER_STATE_CODE: optionalText,
  PDF_PAGE_SIZE: z.string().trim().default('A4'),
})

export type DatabaseClient = z.infer<typeof envSchema>['DATABASE_CLIENT']

export interface DatabaseConfig {
  client: DatabaseClient
  connection: string
}

export interface LoggingConfig {
  level: string
  dir?: string
  requestBodies: boolean
  console: boolean
  silent: boolean
}

export interface SellerDetails {
  name: string
  address?: string
  gstin?: string
  pan?: string
  state?: string
  stateCode?: string
}

export interface PdfConfig {
  pageSize: string
  seller: SellerDetails
}

export interface AppConfig {
  env: 'development' | 'production' | 'test'
  port: number
  database: DatabaseConfig
  logging: LoggingConfig
  maxUploadBytes: number
  pdf: PdfConfig
}

export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration:\n  ${issues.join('\n  ')}`)
    this.name = 'ConfigError'
  }
}

// Some hosts hand out postgres:// URLs; normalise to the canonical scheme
function normalizeDatabaseUrl(client: DatabaseClient, url: string): string {
  if (client === 'pg' && url.startsWith('postgres://')) {
    return url.replace('postgres://', 'postgresql://')
  }
  return url
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env)
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    )
  }

  const vars = parsed.data
  return {
    env: vars.NODE_ENV,
    port: vars.PORT,
    database: {
      client: vars.DATABASE_CLIENT,
      connection: normalizeDatabaseUrl(vars.DATABASE_CLIENT, vars.DATABASE_URL),
    },
    logging: {
      level: vars.LOG_LEVEL,
      dir: vars.LOG_DIR,
      requestBodies: vars.LOG_REQUEST_BODY,
      console: vars.NODE_ENV !== 'production',
      silent: vars.NODE_ENV === 'test',
    },
    maxUploadBytes: vars.MAX_UPLOAD_BYTES,
    pdf: {
      pageSize: vars.PDF_PAGE_SIZE,
      seller: {
        name: vars.SELLER_NAME,
        address: vars.SELLER_ADDRESS,
        gstin: vars.SELLER_GSTIN,
        pan: vars.SELLER_PAN,
        state: vars.SELLER_STATE,
        stateCode: vars.SELLER_STATE_CODE,
      },
    },
  }
}

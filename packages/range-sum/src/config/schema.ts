import { type LogLevelName, logLevelNames } from "@rangecache/logger"
import { z } from "zod"

export const envSchema = z.object({
  RANGE_SUM_CACHE_CAPACITY: z.coerce.number().int().min(1).default(1000),

  LOG_LEVEL: z.enum(logLevelNames).default("info"),
  LOG_PRETTY: z.stringbool().default(false),
  SERVICE_NAME: z.string().min(1).default("range-sum"),
})

export type EnvConfig = z.infer<typeof envSchema>

export type RangeSumEnvKey = keyof EnvConfig

export type RangeSumConfig = {
  cache: {
    capacity: number
  }

  logging: {
    level: LogLevelName
    prettify: boolean
    serviceName: string
  }
}

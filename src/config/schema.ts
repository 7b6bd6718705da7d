import { z } from "zod"

export const distillerConfigSchema = z.object({
  logging: z
    .object({
      verbose: z.boolean().optional(),
    })
    .optional(),

  // notion connection and destination; env vars win over these
  notion: z
    .object({
      apiKey: z.string().min(1).optional(),
      apiVersion: z
        .string()
        .regex(/^\d{4}-\d{2}-\d{2}$/, {
          message: "api version must be a date like '2022-06-28'",
        })
        .optional(),
      baseUrl: z.string().url().optional(),
      databaseId: z.string().min(1).optional(),
      parentPageId: z.string().min(1).optional(),
    })
    .optional(),
})

/** @public */
export type DistillerConfig = z.infer<typeof distillerConfigSchema>

// partial config is what users provide, we merge with defaults
export type DistillerUserConfig = z.input<typeof distillerConfigSchema>

// resolved config has all required fields filled
export interface ResolvedConfig {
  notion: {
    apiKey?: string
    apiVersion: string
    baseUrl: string
    databaseId?: string
    parentPageId?: string
  }
  logging: {
    verbose: boolean
  }
  // config file the values came from, if any
  configFile: string | null
}

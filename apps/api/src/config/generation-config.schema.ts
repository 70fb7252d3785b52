import { z } from 'zod'

/** Largest placeholder side, in pixels, the fallback will allocate. */
export const MAX_PLACEHOLDER_SIDE = 4096

const settingValue = z.union([z.string(), z.number(), z.boolean(), z.array(z.string())])

export const VendorSectionSchema = z.object({
  baseUrl: z.string().url().optional(),
  /** Cookie string for web-session vendors, API key for token vendors. */
  credential: z.string().default(''),
  headers: z.record(z.string()).default({}),
  models: z.record(z.record(settingValue)).default({}),
  defaults: z.record(settingValue).default({}),
})

export const StorageSectionSchema = z.object({
  bucket: z.string().default('genflow'),
  accountId: z.string().default(''),
  endpoint: z.string().default(''),
  accessKeyId: z.string().default(''),
  secretAccessKey: z.string().default(''),
  publicBaseUrl: z.string().default(''),
  prefix: z.string().default('refs'),
})

export const GenerationConfigSchema = z.object({
  timeoutSeconds: z.number().positive().default(30),
  downloadTimeoutSeconds: z.number().positive().default(120),
  maxWaitSeconds: z.number().positive().default(300),
  pollIntervalSeconds: z.number().positive().default(2),
  maxAssetsPerTask: z.number().int().min(1).max(4).default(4),
  defaultPlaceholderSize: z
    .object({
      width: z.number().int().positive().max(MAX_PLACEHOLDER_SIDE),
      height: z.number().int().positive().max(MAX_PLACEHOLDER_SIDE),
    })
    .default({ width: 256, height: 256 }),
  locale: z.enum(['zh-CN', 'en']).default('zh-CN'),
  vendors: z
    .object({
      haiyi: VendorSectionSchema.optional(),
      dashscope: VendorSectionSchema.optional(),
      gaga: VendorSectionSchema.optional(),
    })
    .default({}),
  storage: StorageSectionSchema.optional(),
})

export type GenerationConfig = z.infer<typeof GenerationConfigSchema>
export type VendorSection = z.infer<typeof VendorSectionSchema>
export type StorageSection = z.infer<typeof StorageSectionSchema>
export type Locale = GenerationConfig['locale']

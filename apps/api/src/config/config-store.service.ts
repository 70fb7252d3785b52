import { Inject, Injectable, Logger } from '@nestjs/common'
import { existsSync, readFileSync } from 'fs'
import { resolve } from 'path'
import { errorMessage, isRecord } from '../common/exceptions/app-error'
import { ConfigurationError } from '../generation/generation.errors'
import type { VendorName, VendorSettings } from '../generation/generation.types'
import { GenerationConfig, GenerationConfigSchema } from './generation-config.schema'

export const CONFIG_SOURCE = Symbol('CONFIG_SOURCE')

export interface ConfigSource {
  /** JSON file read on load and on every reload. */
  path?: string
  /** Inline config, used instead of the file when present. */
  raw?: unknown
  env?: Readonly<Record<string, string | undefined>>
}

export const DEFAULT_CONFIG_PATH = 'config/generation.config.json'

const CREDENTIAL_ENV: Readonly<Record<VendorName, string>> = {
  haiyi: 'HAIYI_COOKIE',
  dashscope: 'DASHSCOPE_API_KEY',
  gaga: 'GAGA_COOKIE',
}

const STORAGE_ENV: ReadonlyArray<[string, string]> = [
  ['R2_BUCKET', 'bucket'],
  ['R2_ACCOUNT_ID', 'accountId'],
  ['R2_ENDPOINT', 'endpoint'],
  ['R2_ACCESS_KEY_ID', 'accessKeyId'],
  ['R2_SECRET_ACCESS_KEY', 'secretAccessKey'],
  ['R2_PUBLIC_BASE_URL', 'publicBaseUrl'],
]

function deepFreeze<T>(value: T): T {
  if (value && typeof value === 'object' && !Buffer.isBuffer(value)) {
    Object.values(value).forEach((child) => deepFreeze(child))
    Object.freeze(value)
  }
  return value
}

function asRecord(value: unknown): Record<string, unknown> {
  return isRecord(value) && !Array.isArray(value) ? { ...value } : {}
}

@Injectable()
export class ConfigStore {
  private readonly logger = new Logger(ConfigStore.name)
  private snapshot: GenerationConfig

  constructor(@Inject(CONFIG_SOURCE) private readonly source: ConfigSource) {
    this.snapshot = this.load()
  }

  get current(): GenerationConfig {
    return this.snapshot
  }

  /** Re-reads the source and swaps the snapshot; invocations already running keep the old one. */
  reload(): GenerationConfig {
    this.snapshot = this.load()
    this.logger.log('generation config reloaded', {
      vendors: Object.keys(this.snapshot.vendors),
    })
    return this.snapshot
  }

  requireVendor(vendor: VendorName, defaultBaseUrl: string): VendorSettings {
    const section = this.snapshot.vendors[vendor]
    if (!section) {
      throw new ConfigurationError(`未配置 ${vendor}：请在配置文件 vendors.${vendor} 中填写凭据`)
    }
    const credential = section.credential.trim()
    if (!credential) {
      throw new ConfigurationError(
        `${vendor} 未配置凭据：请填写 vendors.${vendor}.credential 或环境变量 ${CREDENTIAL_ENV[vendor]}`,
      )
    }
    return {
      baseUrl: (section.baseUrl || defaultBaseUrl).trim().replace(/\/+$/, ''),
      credential,
      headers: section.headers,
      models: section.models,
      defaults: section.defaults,
    }
  }

  private load(): GenerationConfig {
    const raw = asRecord(this.source.raw !== undefined ? this.source.raw : this.readFile())
    const withEnv = this.applyEnv(raw)
    const parsed = GenerationConfigSchema.safeParse(withEnv)
    if (!parsed.success) {
      const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      throw new ConfigurationError(`generation config is invalid: ${issues.join('; ')}`, { issues })
    }
    return deepFreeze(parsed.data)
  }

  private readFile(): unknown {
    const file = resolve(process.cwd(), this.source.path || DEFAULT_CONFIG_PATH)
    if (!existsSync(file)) {
      this.logger.warn('generation config file not found, using defaults', { file })
      return {}
    }
    try {
      return JSON.parse(readFileSync(file, 'utf-8'))
    } catch (err: unknown) {
      throw new ConfigurationError(`generation config file is not valid JSON: ${errorMessage(err)}`, { file })
    }
  }

  private applyEnv(raw: Record<string, unknown>): Record<string, unknown> {
    const env = this.source.env ?? {}
    const vendors = asRecord(raw.vendors)
    for (const [vendor, key] of Object.entries(CREDENTIAL_ENV)) {
      const value = env[key]?.trim()
      if (!value) continue
      vendors[vendor] = { ...asRecord(vendors[vendor]), credential: value }
    }

    let storage: Record<string, unknown> | undefined = raw.storage === undefined ? undefined : asRecord(raw.storage)
    for (const [key, field] of STORAGE_ENV) {
      const value = env[key]?.trim()
      if (!value) continue
      storage = { ...(storage ?? {}), [field]: value }
    }

    return { ...raw, vendors, ...(storage ? { storage } : {}) }
  }
}

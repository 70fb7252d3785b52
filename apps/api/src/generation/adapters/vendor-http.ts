import { isRecord } from '../../common/exceptions/app-error'
import { ConfigurationError } from '../generation.errors'
import type {
  GenerationKind,
  GenerationRequest,
  LocalAsset,
  ModelSettings,
  PollSnapshot,
  UpstreamStatus,
  VendorAdapter,
  VendorContext,
  VendorHttpCall,
  VendorResponse,
  VendorSettings,
} from '../generation.types'

const REFERENCE_KINDS: ReadonlySet<GenerationKind> = new Set<GenerationKind>([
  'image_to_image',
  'image_edit',
  'image_to_video',
  'multi_reference_video',
])

const SINGLE_REFERENCE_KINDS: ReadonlySet<GenerationKind> = new Set<GenerationKind>([
  'image_to_image',
  'image_edit',
  'image_to_video',
])

export async function sendVendorCall(
  adapter: VendorAdapter,
  ctx: VendorContext,
  call: VendorHttpCall,
): Promise<VendorResponse> {
  const resp = await ctx.http.request({
    method: call.method,
    url: `${ctx.settings.baseUrl}${call.path}`,
    data: call.body,
    headers: adapter.buildHeaders(ctx.settings),
    timeout: ctx.timeoutMs,
    validateStatus: () => true,
  })
  return { status: resp.status, data: resp.data }
}

export function isSuccessStatus(status: number): boolean {
  return status >= 200 && status < 300
}

export function describeHttpFailure(response: VendorResponse, label: string): string {
  const body = response.data
  if (isRecord(body)) {
    for (const key of ['message', 'error', 'msg']) {
      const value = body[key]
      if (typeof value === 'string' && value.trim()) return value.trim()
    }
  }
  return `${label}: HTTP ${response.status}`
}

/** Clamps a percentage reported upstream; adapters convert fractions before this. */
export function clampProgress(value?: number | null): number | undefined {
  if (typeof value !== 'number' || Number.isNaN(value)) return undefined
  return Math.max(0, Math.min(100, value))
}

/**
 * Maps a poll snapshot through the adapter's static table. Codes missing from
 * the table are generic failures; identical snapshots always map identically.
 */
export function classifyUpstream(adapter: VendorAdapter, snapshot: PollSnapshot): UpstreamStatus {
  if (snapshot.rawCode && adapter.contentPolicyCodes.has(snapshot.rawCode)) {
    return 'content-policy-rejected'
  }
  if (Object.hasOwn(adapter.statusTable, snapshot.rawStatus)) {
    return adapter.statusTable[snapshot.rawStatus]
  }
  return 'generic-failure'
}

export function assertSupported(adapter: VendorAdapter, request: GenerationRequest): void {
  if (!adapter.supports.includes(request.kind)) {
    throw new ConfigurationError(`${adapter.name} 不支持 ${request.kind}，可用类型：${adapter.supports.join(', ')}`)
  }
}

/** Reference assets the request kind actually uses; extra inputs on text kinds are dropped. */
export function resolveReferences(adapter: VendorAdapter, request: GenerationRequest): LocalAsset[] {
  const refs = request.referenceAssets ?? []
  if (!REFERENCE_KINDS.has(request.kind)) return []
  if (!refs.length) {
    throw new ConfigurationError(`${request.kind} 需要至少一张参考图`)
  }
  if (SINGLE_REFERENCE_KINDS.has(request.kind) && refs.length > 1) {
    throw new ConfigurationError(`${request.kind} 仅支持一张参考图，收到 ${refs.length} 张`)
  }
  if (refs.length > adapter.maxReferenceAssets) {
    throw new ConfigurationError(
      `${adapter.name} 最多支持 ${adapter.maxReferenceAssets} 张参考图，收到 ${refs.length} 张`,
    )
  }
  return refs
}

export function resolveModelName(
  request: GenerationRequest,
  settings: VendorSettings,
  fallback?: string,
): string {
  const fromRequest = request.model?.trim()
  if (fromRequest) return fromRequest
  const fromDefaults = settings.defaults[`${request.kind}Model`] ?? settings.defaults.model
  if (typeof fromDefaults === 'string' && fromDefaults.trim()) return fromDefaults.trim()
  if (fallback) return fallback
  const first = Object.keys(settings.models)[0]
  if (!first) {
    throw new ConfigurationError(`未配置可用模型，请在 models 中至少添加一个模型`)
  }
  return first
}

export function modelEntry(settings: VendorSettings, model: string, vendor: string): ModelSettings {
  const entry = settings.models[model]
  if (!entry) {
    throw new ConfigurationError(`未找到模型配置：${model}，请在 vendors.${vendor}.models 中添加`)
  }
  return entry
}

export function numberSetting(settings: ModelSettings, key: string, fallback: number): number {
  const value = settings[key]
  return typeof value === 'number' && Number.isFinite(value) ? value : fallback
}

export function stringSetting(settings: ModelSettings, key: string, fallback: string): string {
  const value = settings[key]
  return typeof value === 'string' && value.trim() ? value.trim() : fallback
}

export function booleanSetting(settings: ModelSettings, key: string, fallback: boolean): boolean {
  const value = settings[key]
  return typeof value === 'boolean' ? value : fallback
}

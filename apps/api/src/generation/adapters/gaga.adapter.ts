import FormData from 'form-data'
import { z } from 'zod'
import type {
  GenerationRequest,
  LocalAsset,
  PollSnapshot,
  PreparedRequest,
  RemoteAssetRef,
  SubmissionOutcome,
  SubmissionPlan,
  VendorAdapter,
  VendorContext,
  VendorResponse,
  VendorSettings,
} from '../generation.types'
import {
  assertSupported,
  booleanSetting,
  describeHttpFailure,
  isSuccessStatus,
  numberSetting,
  resolveModelName,
  resolveReferences,
  stringSetting,
} from './vendor-http'
import { extensionForMime } from '../../media/media-codec'

const DEFAULT_GAGA_BASE_URL = 'https://gaga.art'
const DEFAULT_GAGA_MODEL = 'test-performer'
const CONTENT_POLICY_HTTP_STATUS = 451
const SENSITIVE_PATTERN = /sensitive|敏感/i

const AssetResponseSchema = z.object({
  id: z.union([z.number(), z.string()]),
  width: z.number().positive(),
  height: z.number().positive(),
  url: z.string().optional(),
})

const SubmitResponseSchema = z.object({ id: z.union([z.number(), z.string()]) })

const GenerationResponseSchema = z.object({
  id: z.union([z.number(), z.string()]).optional(),
  status: z.string(),
  resultVideoURL: z.string().nullish(),
  result: z.object({ videoURL: z.string().nullish() }).nullish(),
  progress: z.number().nullish(),
  message: z.string().nullish(),
  errorCode: z.string().nullish(),
})

export interface CropArea {
  x: number
  y: number
  width: number
  height: number
}

/**
 * 16:9 crop inside the source image: width-first, or height-first when the
 * derived height overflows. The origin is clamped so the box stays inside.
 */
export function computeCrop(imageWidth: number, imageHeight: number, x = 0, y = 0): CropArea {
  let width = imageWidth
  let height = Math.round((imageWidth * 9) / 16)
  if (height > imageHeight) {
    height = imageHeight
    width = Math.round((imageHeight * 16) / 9)
  }
  return {
    x: Math.max(0, Math.min(x, Math.max(0, imageWidth - width))),
    y: Math.max(0, Math.min(y, Math.max(0, imageHeight - height))),
    width,
    height,
  }
}

function isSensitiveMessage(data: unknown): string | null {
  const parsed = z.object({ message: z.string() }).safeParse(data)
  if (parsed.success && SENSITIVE_PATTERN.test(parsed.data.message)) return parsed.data.message
  return null
}

function buildPerformerBody(prepared: PreparedRequest, ref: RemoteAssetRef) {
  const { request, model, modelSettings } = prepared
  const crop = computeCrop(ref.width ?? 0, ref.height ?? 0)
  const enableWatermark = request.extras?.enableWatermark
  return {
    model,
    aspectRatio: request.aspectRatio || '16:9',
    taskType: 'I2FV',
    taskSource: 'HUMAN',
    source: { type: 'image', content: String(ref.vendorAssetId ?? '') },
    chunks: [
      {
        duration: Math.trunc(request.durationSeconds ?? 10),
        conditions: [{ type: 'text', content: request.prompt }],
      },
    ],
    extraArgs: {
      enablePromptEnhancement: booleanSetting(modelSettings, 'enablePromptEnhancement', true),
      cropArea: crop,
      extraInferArgs: {
        enhancementType: stringSetting(modelSettings, 'enhancementType', 'i2v_performer_performer-v3-6_gemini'),
        nSampleSteps: numberSetting(modelSettings, 'nSampleSteps', 32),
        resolution: request.resolution || stringSetting(modelSettings, 'resolution', '540p'),
        enableWatermark: typeof enableWatermark === 'boolean' ? enableWatermark : false,
        specialTokens: [],
        vaeModel: '',
        extra: '',
        modelVersion: '',
        dryRun: false,
        enableInputVideoToTs: false,
      },
      tSchedulerFunc: '',
      tSchedulerArgs: '',
    },
  }
}

export const gagaAdapter: VendorAdapter = {
  name: 'gaga',
  supports: ['image_to_video'],
  defaultBaseUrl: DEFAULT_GAGA_BASE_URL,
  maxReferenceAssets: 1,
  statusTable: {
    Pending: 'running',
    Queued: 'running',
    Running: 'running',
    Success: 'success',
    Canceled: 'upstream-cancelled',
    Failed: 'generic-failure',
    Error: 'generic-failure',
  },
  contentPolicyCodes: new Set(['451', 'ContentPolicy']),

  buildHeaders(settings: VendorSettings) {
    return {
      accept: 'application/json, text/plain, */*',
      origin: settings.baseUrl,
      referer: `${settings.baseUrl}/app`,
      'content-type': 'application/json',
      ...settings.headers,
      cookie: settings.credential,
    }
  },

  prepare(request: GenerationRequest, settings: VendorSettings): PreparedRequest {
    assertSupported(gagaAdapter, request)
    const referenceAssets = resolveReferences(gagaAdapter, request)
    const model = resolveModelName(request, settings, DEFAULT_GAGA_MODEL)
    return {
      request: { ...request, referenceAssets },
      model,
      modelSettings: { ...settings.defaults, ...(settings.models[model] ?? {}) },
    }
  },

  async uploadAsset(asset: LocalAsset, _prepared: PreparedRequest, ctx: VendorContext) {
    const contentType = asset.mimeType || 'image/png'
    const form = new FormData()
    form.append('file', asset.data, {
      filename: asset.filename || `reference.${extensionForMime(contentType) ?? 'bin'}`,
      contentType,
    })
    const { 'content-type': _json, ...headers } = gagaAdapter.buildHeaders(ctx.settings)
    const resp = await ctx.http.post(`${ctx.settings.baseUrl}/api/v1/assets`, form, {
      headers: { ...headers, ...form.getHeaders() },
      timeout: ctx.timeoutMs,
      maxBodyLength: Infinity,
      validateStatus: () => true,
    })
    if (!isSuccessStatus(resp.status)) {
      throw new Error(describeHttpFailure({ status: resp.status, data: resp.data }, '上传图片失败'))
    }
    const parsed = AssetResponseSchema.safeParse(resp.data)
    if (!parsed.success) {
      throw new Error('上传图片响应异常: 缺少 id 或宽高')
    }
    const { id, width, height, url } = parsed.data
    return { url: url || `gaga-asset://${id}`, vendorAssetId: String(id), width, height }
  },

  buildSubmission(prepared: PreparedRequest, refs: RemoteAssetRef[]): SubmissionPlan {
    const [ref] = refs
    return {
      call: {
        method: 'POST',
        path: '/api/v1/generations/performer',
        body: ref ? buildPerformerBody(prepared, ref) : undefined,
      },
      pollParams: {},
    }
  },

  parseSubmission(response: VendorResponse): SubmissionOutcome {
    const sensitive = isSensitiveMessage(response.data)
    if (response.status === CONTENT_POLICY_HTTP_STATUS || sensitive) {
      return {
        kind: 'content_policy',
        message: sensitive || '提交内容未通过审核',
        code: String(CONTENT_POLICY_HTTP_STATUS),
      }
    }
    if (!isSuccessStatus(response.status)) {
      return { kind: 'rejected', message: describeHttpFailure(response, '提交任务失败') }
    }
    const parsed = SubmitResponseSchema.safeParse(response.data)
    if (!parsed.success) {
      return { kind: 'rejected', message: '提交任务异常：响应中缺少id字段' }
    }
    return { kind: 'accepted', taskId: String(parsed.data.id) }
  },

  buildPollCall(taskId) {
    return { method: 'GET', path: `/api/v1/generations/${encodeURIComponent(taskId)}?chunks=true` }
  },

  parsePoll(response: VendorResponse): PollSnapshot | null {
    if (!isSuccessStatus(response.status)) {
      throw new Error(describeHttpFailure(response, '轮询请求失败'))
    }
    const parsed = GenerationResponseSchema.safeParse(response.data)
    if (!parsed.success) throw new Error('轮询响应格式异常')
    const data = parsed.data
    if (!data.status) return null
    const videoUrl = data.resultVideoURL || data.result?.videoURL
    const sensitive = data.message && SENSITIVE_PATTERN.test(data.message)
    return {
      rawStatus: data.status,
      rawCode: sensitive ? 'ContentPolicy' : data.errorCode ?? undefined,
      progress: data.progress ?? undefined,
      assetUrls: videoUrl ? [videoUrl] : [],
      message: data.message ?? undefined,
    }
  },
}

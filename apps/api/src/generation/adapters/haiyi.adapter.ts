import { createHash } from 'crypto'
import { z } from 'zod'
import { ConfigurationError } from '../generation.errors'
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
import { OUTPUT_KIND } from '../generation.types'
import {
  assertSupported,
  describeHttpFailure,
  isSuccessStatus,
  modelEntry,
  resolveModelName,
  resolveReferences,
} from './vendor-http'
import { extensionForMime } from '../../media/media-codec'

const DEFAULT_HAIYI_BASE_URL = 'https://www.haiyi.art'
const OK_CODE = 10000
const SENSITIVE_PROMPT_CODE = 70026
const UPLOAD_CATEGORY = 20

const statusSchema = z.object({ code: z.number(), msg: z.string().nullish() })

const envelope = <T extends z.ZodTypeAny>(data: T) =>
  z.object({
    status: statusSchema,
    data: data.nullish(),
  })

const SubmitResponseSchema = envelope(
  z.object({ id: z.union([z.string(), z.number()]).nullish() }).passthrough(),
)

const ProgressItemSchema = z.object({
  status: z.number(),
  process: z.number().nullish(),
  img_uris: z
    .array(
      z.object({
        index: z.number().nullish(),
        url: z.string().nullish(),
        cover_url: z.string().nullish(),
      }),
    )
    .nullish(),
})

const ProgressResponseSchema = envelope(z.object({ items: z.array(ProgressItemSchema).nullish() }))
const PresignResponseSchema = envelope(z.object({ pre_sign: z.string().min(1), file_id: z.string().min(1) }))
const ConfirmResponseSchema = envelope(z.object({ url: z.string().min(1) }))
const AssetsResponseSchema = envelope(z.object({ temp_coins: z.number().int() }))

const ImageModelSchema = z.object({
  applyId: z.string().min(1),
  verNo: z.string().optional(),
  ss: z.number().int().default(52),
  nodeType: z.string().default('HaiYiNanoBananaPro'),
  promptNodeId: z.string().default('1'),
  imageNodeIds: z.array(z.string()).default(['4', '5', '6']),
})

const VideoModelSchema = z.object({
  modelNo: z.string().min(1),
  modelVerNo: z.string().min(1),
  ss: z.number().int().default(52),
})

type ImageModel = z.infer<typeof ImageModelSchema>
type VideoModel = z.infer<typeof VideoModelSchema>

/** Tagged reply of the apply / text-to-video style endpoints. */
type HaiyiSubmitReply =
  | { tag: 'accepted'; id: string }
  | { tag: 'sensitive'; msg: string }
  | { tag: 'error'; code: number; msg: string }

const VIDEO_SIZES: Record<string, Record<string, [number, number]>> = {
  '360p': { '16:9': [640, 360], '9:16': [360, 640] },
  '720p': { '16:9': [1280, 720], '9:16': [720, 1280] },
  '1080p': { '16:9': [1920, 1080], '9:16': [1080, 1920] },
}

function sizeForQuality(aspectRatio: string, quality: string): [number, number] {
  const table = VIDEO_SIZES[quality] ?? VIDEO_SIZES['360p']
  return table[aspectRatio] ?? [640, 360]
}

function parseModel<S extends z.ZodTypeAny>(schema: S, prepared: PreparedRequest): z.infer<S> {
  const parsed = schema.safeParse(prepared.modelSettings)
  if (!parsed.success) {
    const fields = parsed.error.issues.map((issue) => issue.path.join('.')).join(', ')
    throw new ConfigurationError(`海艺模型 ${prepared.model} 配置不完整：${fields}`)
  }
  return parsed.data
}

function templateId(prepared: PreparedRequest): string {
  return OUTPUT_KIND[prepared.request.kind] === 'image'
    ? parseModel(ImageModelSchema, prepared).applyId
    : parseModel(VideoModelSchema, prepared).modelNo
}

function readSubmitReply(data: unknown): HaiyiSubmitReply | null {
  const parsed = SubmitResponseSchema.safeParse(data)
  if (!parsed.success) return null
  const { status } = parsed.data
  const msg = status.msg ?? ''
  if (status.code === OK_CODE) {
    const id = parsed.data.data?.id
    return id === undefined || id === null || id === ''
      ? { tag: 'error', code: status.code, msg: '未返回 task_id' }
      : { tag: 'accepted', id: String(id) }
  }
  if (status.code === SENSITIVE_PROMPT_CODE) return { tag: 'sensitive', msg }
  return { tag: 'error', code: status.code, msg }
}

function buildImageBody(request: GenerationRequest, model: ImageModel, refs: RemoteAssetRef[]) {
  const inputs: Array<{ field: string; node_id: string; node_type: string; val: string }> = refs.map(
    (ref, i) => ({
      field: 'image',
      node_id: model.imageNodeIds[i] ?? String(4 + i),
      node_type: 'LoadImage',
      val: ref.url,
    }),
  )
  inputs.push(
    { field: 'prompt', node_id: model.promptNodeId, node_type: model.nodeType, val: request.prompt },
    { field: 'resolution', node_id: model.promptNodeId, node_type: model.nodeType, val: request.resolution || '1K' },
    { field: 'aspect_ratio', node_id: model.promptNodeId, node_type: model.nodeType, val: request.aspectRatio || '3:4' },
  )
  return {
    apply_id: model.applyId,
    inputs,
    ...(model.verNo ? { ver_no: model.verNo } : {}),
    ss: model.ss,
  }
}

function buildVideoBody(request: GenerationRequest, model: VideoModel, refs: RemoteAssetRef[]) {
  const aspectRatio = request.aspectRatio || '16:9'
  const quality = (request.resolution || '360p').toLowerCase()
  const [width, height] = sizeForQuality(aspectRatio, quality)
  const duration = Math.trunc(request.durationSeconds ?? 5)
  const hdMode = request.extras?.hdMode === true
  const audioEffect = request.extras?.audioEffect === true

  if (request.kind === 'multi_reference_video') {
    return {
      model_no: model.modelNo,
      model_ver_no: model.modelVerNo,
      meta: {
        prompt: request.prompt,
        width,
        height,
        negative_prompt: request.negativePrompt ?? '',
        aspect_ratio: aspectRatio,
        generate: { gen_mode: hdMode ? 1 : 0 },
        generate_video: {
          generate_video_duration: duration,
          audio_effect: audioEffect,
          movement_amplitude: 'auto',
          image_opts: refs.map((ref) => ({ url: ref.url })),
        },
        original_translated_meta_prompt: '',
      },
      task_domain_type: 25,
      ss: model.ss,
    }
  }

  const firstFrame = refs[0]
  return {
    model_no: model.modelNo,
    model_ver_no: model.modelVerNo,
    meta: {
      prompt: request.prompt,
      generate_video: {
        relevance: 0.5,
        camera_control_option: { mode: 'Camera Movement', offset: 0 },
        generate_video_duration: duration,
        ...(firstFrame ? { image_opts: [{ mode: 'first_frame', url: firstFrame.url }] } : {}),
        quality_mode: quality,
        audio_effect: audioEffect,
        n_iter: 1,
      },
      width,
      height,
      lora_models: [],
      aspect_ratio: firstFrame ? '' : aspectRatio,
      generate: { anime_enhance: 2, mode: 0, gen_mode: hdMode ? 1 : 0 },
      n_iter: 1,
      original_translated_meta_prompt: '',
    },
    ss: model.ss,
  }
}

const VIDEO_PATHS = {
  text_to_video: '/api/v1/task/v2/video/text-to-video',
  image_to_video: '/api/v1/task/v2/video/img-to-video',
  multi_reference_video: '/api/v1/task/v2/video/multi-img-to-video',
} as const

export const haiyiAdapter: VendorAdapter = {
  name: 'haiyi',
  supports: ['text_to_image', 'image_to_image', 'image_edit', 'text_to_video', 'image_to_video', 'multi_reference_video'],
  defaultBaseUrl: DEFAULT_HAIYI_BASE_URL,
  maxReferenceAssets: 4,
  // 1 排队, 2 生成中, 3 完成, 4 系统取消
  statusTable: {
    '1': 'running',
    '2': 'running',
    '3': 'success',
    '4': 'upstream-cancelled',
  },
  contentPolicyCodes: new Set([String(SENSITIVE_PROMPT_CODE)]),

  buildHeaders(settings: VendorSettings) {
    return {
      accept: 'application/json, text/plain, */*',
      'content-type': 'application/json',
      origin: DEFAULT_HAIYI_BASE_URL,
      referer: `${DEFAULT_HAIYI_BASE_URL}/`,
      'user-agent': 'Mozilla/5.0',
      'x-app-id': 'web_global_seaart',
      'x-platform': 'web',
      ...settings.headers,
      Cookie: settings.credential,
    }
  },

  prepare(request: GenerationRequest, settings: VendorSettings): PreparedRequest {
    assertSupported(haiyiAdapter, request)
    const referenceAssets = resolveReferences(haiyiAdapter, request)
    const model = resolveModelName(request, settings)
    const prepared: PreparedRequest = {
      request: { ...request, referenceAssets },
      model,
      modelSettings: modelEntry(settings, model, 'haiyi'),
    }
    templateId(prepared)
    return prepared
  },

  async uploadAsset(asset: LocalAsset, prepared: PreparedRequest, ctx: VendorContext) {
    const headers = haiyiAdapter.buildHeaders(ctx.settings)
    const contentType = asset.mimeType || 'image/png'
    const template = templateId(prepared)
    const presign = await ctx.http.post(
      `${ctx.settings.baseUrl}/api/v1/resource/uploadImageByPreSign`,
      {
        content_type: contentType,
        file_name: asset.filename || `genflow_${Date.now()}.${extensionForMime(contentType) ?? 'bin'}`,
        file_size: asset.data.length,
        category: UPLOAD_CATEGORY,
        hash_val: createHash('sha256').update(asset.data).digest('hex'),
        template_id: template,
      },
      { headers, timeout: ctx.timeoutMs, validateStatus: () => true },
    )
    const presigned = PresignResponseSchema.safeParse(presign.data)
    if (!isSuccessStatus(presign.status) || !presigned.success || presigned.data.status.code !== OK_CODE || !presigned.data.data) {
      throw new Error(describeHttpFailure({ status: presign.status, data: presign.data }, '预签名失败'))
    }
    const { pre_sign: preSign, file_id: fileId } = presigned.data.data

    const put = await ctx.http.put(preSign, asset.data, {
      headers: {
        Accept: '*/*',
        'Content-Type': contentType,
        Origin: DEFAULT_HAIYI_BASE_URL,
        Referer: `${DEFAULT_HAIYI_BASE_URL}/`,
        'User-Agent': headers['user-agent'],
      },
      timeout: ctx.timeoutMs,
      maxBodyLength: Infinity,
      validateStatus: () => true,
    })
    if (!isSuccessStatus(put.status)) {
      throw new Error(`PUT 上传失败: HTTP ${put.status}`)
    }

    const confirm = await ctx.http.post(
      `${ctx.settings.baseUrl}/api/v1/resource/confirmImageUploadedByPreSign`,
      { category: UPLOAD_CATEGORY, file_id: fileId, template_id: template },
      { headers, timeout: ctx.timeoutMs, validateStatus: () => true },
    )
    const confirmed = ConfirmResponseSchema.safeParse(confirm.data)
    if (!isSuccessStatus(confirm.status) || !confirmed.success || confirmed.data.status.code !== OK_CODE || !confirmed.data.data) {
      throw new Error(describeHttpFailure({ status: confirm.status, data: confirm.data }, '确认上传失败'))
    }
    return { url: confirmed.data.data.url, vendorAssetId: fileId }
  },

  buildSubmission(prepared: PreparedRequest, refs: RemoteAssetRef[]): SubmissionPlan {
    const { request } = prepared
    if (OUTPUT_KIND[request.kind] === 'image') {
      const model = parseModel(ImageModelSchema, prepared)
      return {
        call: { method: 'POST', path: '/api/v1/creativity/generate/apply', body: buildImageBody(request, model, refs) },
        pollParams: { ss: model.ss },
      }
    }
    const model = parseModel(VideoModelSchema, prepared)
    const path =
      request.kind === 'multi_reference_video'
        ? VIDEO_PATHS.multi_reference_video
        : request.kind === 'image_to_video'
          ? VIDEO_PATHS.image_to_video
          : VIDEO_PATHS.text_to_video
    return {
      call: { method: 'POST', path, body: buildVideoBody(request, model, refs) },
      pollParams: { ss: model.ss },
    }
  },

  parseSubmission(response: VendorResponse): SubmissionOutcome {
    if (!isSuccessStatus(response.status)) {
      return { kind: 'rejected', message: describeHttpFailure(response, '提交任务请求失败') }
    }
    const reply = readSubmitReply(response.data)
    if (!reply) return { kind: 'rejected', message: '提交失败: 未知响应格式' }
    switch (reply.tag) {
      case 'accepted':
        return { kind: 'accepted', taskId: reply.id }
      case 'sensitive':
        return {
          kind: 'content_policy',
          message: reply.msg || '您的提示词中含有敏感词汇，请修改后再试',
          code: String(SENSITIVE_PROMPT_CODE),
        }
      case 'error':
        return { kind: 'rejected', message: `提交失败: code=${reply.code}, msg=${reply.msg}`, code: String(reply.code) }
    }
  },

  buildPollCall(taskId, pollParams) {
    return {
      method: 'POST',
      path: '/api/v1/task/batch-progress',
      body: { task_ids: [taskId], ss: pollParams.ss ?? 52 },
    }
  },

  parsePoll(response: VendorResponse): PollSnapshot | null {
    if (!isSuccessStatus(response.status)) {
      throw new Error(describeHttpFailure(response, '轮询请求失败'))
    }
    const parsed = ProgressResponseSchema.safeParse(response.data)
    if (!parsed.success) throw new Error('轮询响应格式异常')
    if (parsed.data.status.code !== OK_CODE) {
      throw new Error(`轮询失败: code=${parsed.data.status.code}, msg=${parsed.data.status.msg ?? ''}`)
    }
    const item = parsed.data.data?.items?.[0]
    if (!item) return null
    const assetUrls = (item.img_uris ?? [])
      .map((uri, position) => ({ order: uri.index ?? 1000 + position, url: uri.url || uri.cover_url || '' }))
      .filter((entry) => entry.url)
      .sort((a, b) => a.order - b.order)
      .map((entry) => entry.url)
    return {
      rawStatus: String(item.status),
      progress: item.process ?? undefined,
      assetUrls,
    }
  },

  buildQuotaCall() {
    return { method: 'POST', path: '/api/v1/payment/assets/get', body: {} }
  },

  parseQuota(response: VendorResponse): number {
    if (!isSuccessStatus(response.status)) {
      throw new Error(describeHttpFailure(response, '查询积分失败'))
    }
    const parsed = AssetsResponseSchema.safeParse(response.data)
    if (!parsed.success || parsed.data.status.code !== OK_CODE || !parsed.data.data) {
      throw new Error('查询积分失败: 未知响应格式')
    }
    return parsed.data.data.temp_coins
  },
}

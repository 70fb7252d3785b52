import { z } from 'zod'
import type {
  GenerationKind,
  GenerationRequest,
  PollSnapshot,
  PreparedRequest,
  RemoteAssetRef,
  SubmissionOutcome,
  SubmissionPlan,
  VendorAdapter,
  VendorResponse,
  VendorSettings,
} from '../generation.types'
import {
  assertSupported,
  describeHttpFailure,
  isSuccessStatus,
  resolveModelName,
  resolveReferences,
  stringSetting,
} from './vendor-http'

const DEFAULT_DASHSCOPE_BASE_URL = 'https://dashscope.aliyuncs.com'

const DEFAULT_MODELS: Partial<Record<GenerationKind, string>> = {
  text_to_image: 'wanx2.1-t2i-turbo',
  image_edit: 'wanx2.1-imageedit',
  text_to_video: 'wan2.2-t2v-plus',
  image_to_video: 'wan2.2-i2v-plus',
}

const IMAGE_SIZES: Record<string, string> = {
  '1:1': '1024*1024',
  '16:9': '1280*720',
  '9:16': '720*1280',
  '4:3': '1024*768',
  '3:4': '768*1024',
}

const VIDEO_SIZES: Record<string, Record<string, string>> = {
  '480P': { '16:9': '832*480', '9:16': '480*832', '1:1': '624*624' },
  '720P': { '16:9': '1280*720', '9:16': '720*1280', '1:1': '960*960', '4:3': '960*720', '3:4': '720*960' },
  '1080P': { '16:9': '1920*1080', '9:16': '1080*1920', '1:1': '1440*1440', '4:3': '1632*1248', '3:4': '1248*1632' },
}

const SubmitResponseSchema = z.object({
  output: z.object({ task_id: z.string().min(1), task_status: z.string().optional() }).optional(),
  code: z.string().optional(),
  message: z.string().optional(),
  request_id: z.string().optional(),
})

const TaskResponseSchema = z.object({
  output: z.object({
    task_id: z.string().optional(),
    task_status: z.string(),
    code: z.string().optional(),
    message: z.string().optional(),
    video_url: z.string().optional(),
    results: z
      .array(
        z.object({
          url: z.string().optional(),
          code: z.string().optional(),
          message: z.string().optional(),
        }),
      )
      .optional(),
  }),
})

/** Per-endpoint payload variants of the DashScope async services. */
type DashScopeSubmission =
  | { endpoint: 'text2image'; body: { model: string; input: { prompt: string; negative_prompt?: string }; parameters: { size: string; n: number; seed?: number } } }
  | { endpoint: 'image2image'; body: { model: string; input: { function: string; prompt: string; base_image_url: string }; parameters: { n: number } } }
  | { endpoint: 'video'; body: { model: string; input: { prompt: string; negative_prompt?: string; img_url?: string }; parameters: { size: string; duration?: number; seed?: number } } }

const ENDPOINT_PATHS: Record<DashScopeSubmission['endpoint'], string> = {
  text2image: '/api/v1/services/aigc/text2image/image-synthesis',
  image2image: '/api/v1/services/aigc/image2image/image-synthesis',
  video: '/api/v1/services/aigc/video-generation/video-synthesis',
}

function imageCount(request: GenerationRequest): number {
  const n = request.extras?.n
  return typeof n === 'number' && Number.isInteger(n) && n >= 1 && n <= 4 ? n : 1
}

function buildSubmission(prepared: PreparedRequest, refs: RemoteAssetRef[]): DashScopeSubmission {
  const { request, model } = prepared
  const ratio = request.aspectRatio || '16:9'
  switch (request.kind) {
    case 'image_edit':
      return {
        endpoint: 'image2image',
        body: {
          model,
          input: {
            function: stringSetting(prepared.modelSettings, 'function', 'description_edit'),
            prompt: request.prompt,
            base_image_url: refs[0]?.url ?? '',
          },
          parameters: { n: imageCount(request) },
        },
      }
    case 'text_to_video':
    case 'image_to_video': {
      const resolution = (request.resolution || '720P').toUpperCase()
      const size = VIDEO_SIZES[resolution]?.[ratio] ?? VIDEO_SIZES['720P']['16:9']
      return {
        endpoint: 'video',
        body: {
          model,
          input: {
            prompt: request.prompt,
            ...(request.negativePrompt ? { negative_prompt: request.negativePrompt } : {}),
            ...(refs[0] ? { img_url: refs[0].url } : {}),
          },
          parameters: {
            size,
            ...(request.durationSeconds ? { duration: Math.trunc(request.durationSeconds) } : {}),
            ...(request.seed !== undefined ? { seed: request.seed } : {}),
          },
        },
      }
    }
    default:
      return {
        endpoint: 'text2image',
        body: {
          model,
          input: {
            prompt: request.prompt,
            ...(request.negativePrompt ? { negative_prompt: request.negativePrompt } : {}),
          },
          parameters: {
            size: IMAGE_SIZES[request.aspectRatio || '1:1'] ?? IMAGE_SIZES['1:1'],
            n: imageCount(request),
            ...(request.seed !== undefined ? { seed: request.seed } : {}),
          },
        },
      }
  }
}

export const dashscopeAdapter: VendorAdapter = {
  name: 'dashscope',
  supports: ['text_to_image', 'image_edit', 'text_to_video', 'image_to_video'],
  defaultBaseUrl: DEFAULT_DASHSCOPE_BASE_URL,
  maxReferenceAssets: 1,
  statusTable: {
    PENDING: 'running',
    RUNNING: 'running',
    SUCCEEDED: 'success',
    CANCELED: 'upstream-cancelled',
    FAILED: 'generic-failure',
    UNKNOWN: 'generic-failure',
  },
  contentPolicyCodes: new Set(['DataInspectionFailed', 'data_inspection_failed']),

  buildHeaders(settings: VendorSettings) {
    return {
      'Content-Type': 'application/json',
      'X-DashScope-Async': 'enable',
      ...settings.headers,
      Authorization: `Bearer ${settings.credential}`,
    }
  },

  prepare(request: GenerationRequest, settings: VendorSettings): PreparedRequest {
    assertSupported(dashscopeAdapter, request)
    const referenceAssets = resolveReferences(dashscopeAdapter, request)
    const model = resolveModelName(request, settings, DEFAULT_MODELS[request.kind])
    return {
      request: { ...request, referenceAssets },
      model,
      modelSettings: settings.models[model] ?? {},
    }
  },

  buildSubmission(prepared: PreparedRequest, refs: RemoteAssetRef[]): SubmissionPlan {
    const submission = buildSubmission(prepared, refs)
    return {
      call: { method: 'POST', path: ENDPOINT_PATHS[submission.endpoint], body: submission.body },
      pollParams: {},
    }
  },

  parseSubmission(response: VendorResponse): SubmissionOutcome {
    const parsed = SubmitResponseSchema.safeParse(response.data)
    const code = parsed.success ? parsed.data.code : undefined
    if (code && dashscopeAdapter.contentPolicyCodes.has(code)) {
      return {
        kind: 'content_policy',
        message: (parsed.success && parsed.data.message) || '输入内容未通过安全审核',
        code,
      }
    }
    if (!isSuccessStatus(response.status)) {
      return { kind: 'rejected', message: describeHttpFailure(response, 'DashScope 任务创建失败'), code }
    }
    const taskId = parsed.success ? parsed.data.output?.task_id : undefined
    if (!taskId) {
      return { kind: 'rejected', message: 'DashScope API 未返回任务 ID', code }
    }
    return { kind: 'accepted', taskId }
  },

  buildPollCall(taskId) {
    return { method: 'GET', path: `/api/v1/tasks/${encodeURIComponent(taskId)}` }
  },

  parsePoll(response: VendorResponse): PollSnapshot | null {
    if (!isSuccessStatus(response.status)) {
      throw new Error(describeHttpFailure(response, 'DashScope result poll failed'))
    }
    const parsed = TaskResponseSchema.safeParse(response.data)
    if (!parsed.success) throw new Error('DashScope 轮询响应格式异常')
    const { output } = parsed.data
    const resultUrls = (output.results ?? []).map((item) => item.url).filter((url): url is string => !!url)
    // per-image failure codes only matter when nothing usable came back
    const failedResult = resultUrls.length ? undefined : (output.results ?? []).find((item) => item.code)
    return {
      rawStatus: output.task_status,
      rawCode: output.code ?? failedResult?.code,
      assetUrls: output.video_url ? [output.video_url] : resultUrls,
      message: output.message ?? failedResult?.message,
    }
  },
}

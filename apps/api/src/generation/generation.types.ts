import type { AxiosInstance } from 'axios'

export type VendorName = 'haiyi' | 'dashscope' | 'gaga'

export type GenerationKind =
  | 'text_to_image'
  | 'image_to_image'
  | 'image_edit'
  | 'text_to_video'
  | 'image_to_video'
  | 'multi_reference_video'

export type OutputKind = 'image' | 'video'

export const OUTPUT_KIND: Readonly<Record<GenerationKind, OutputKind>> = {
  text_to_image: 'image',
  image_to_image: 'image',
  image_edit: 'image',
  text_to_video: 'video',
  image_to_video: 'video',
  multi_reference_video: 'video',
}

export type TaskStatus = 'submitted' | 'running' | 'succeeded' | 'failed' | 'cancelled' | 'timed_out'

/** Vendor-neutral status taxonomy every upstream code is mapped onto. */
export type UpstreamStatus =
  | 'success'
  | 'running'
  | 'generic-failure'
  | 'upstream-cancelled'
  | 'content-policy-rejected'

export type FailureCategory =
  | 'content_policy'
  | 'submission'
  | 'upload'
  | 'timeout'
  | 'cancelled'
  | 'failed'
  | 'assembly'

export interface TaskErrorInfo {
  category: FailureCategory
  message?: string
  code?: string
}

export interface LocalAsset {
  sourceRef: string
  data: Buffer
  mimeType?: string
  filename?: string
}

export interface TaskAsset {
  index: number
  kind: OutputKind
  sourceRef: string
  remoteUrl?: string
  bytes?: Buffer
}

export interface RemoteAssetRef {
  index: number
  sourceRef: string
  url: string
  vendorAssetId?: string
  width?: number
  height?: number
}

export interface GenerationRequest {
  vendor: VendorName
  kind: GenerationKind
  prompt: string
  model?: string
  negativePrompt?: string
  aspectRatio?: string
  resolution?: string
  durationSeconds?: number
  seed?: number
  referenceAssets?: LocalAsset[]
  extras?: Record<string, unknown>
  progressChannel?: string
}

export interface ImageFrame {
  kind: 'image'
  mimeType: string
  width: number
  height: number
  data: Buffer
  sourceUrl: string | null
}

export interface VideoClip {
  kind: 'video'
  mimeType: string
  data: Buffer
  sourceUrl: string | null
}

export type MediaItem = ImageFrame | VideoClip

export interface ImageGenerationResult {
  outputKind: 'image'
  assets: ImageFrame[]
  infoText: string
  usedFallback: boolean
  taskId?: string
}

export interface VideoGenerationResult {
  outputKind: 'video'
  assets: [VideoClip]
  infoText: string
  usedFallback: boolean
  taskId?: string
}

export type GenerationResult = ImageGenerationResult | VideoGenerationResult

export interface PollState {
  attempts: number
  misses: number
  elapsedSeconds: number
  intervalSeconds: number
  maxWaitSeconds: number
}

export interface QuotaSnapshot {
  balance: number
  queriedAt: number
  ok: boolean
}

export type ModelSettings = Readonly<Record<string, string | number | boolean | string[]>>

export interface VendorSettings {
  baseUrl: string
  credential: string
  headers: Readonly<Record<string, string>>
  models: Readonly<Record<string, ModelSettings>>
  defaults: ModelSettings
}

export interface VendorContext {
  http: AxiosInstance
  settings: VendorSettings
  timeoutMs: number
}

export interface VendorHttpCall {
  method: 'GET' | 'POST'
  path: string
  body?: unknown
}

export interface VendorResponse {
  status: number
  data: unknown
}

export interface PreparedRequest {
  request: GenerationRequest
  model: string
  modelSettings: ModelSettings
}

export interface SubmissionPlan {
  call: VendorHttpCall
  pollParams: Readonly<Record<string, string | number>>
}

export type SubmissionOutcome =
  | { kind: 'accepted'; taskId: string }
  | { kind: 'content_policy'; message: string; code?: string }
  | { kind: 'rejected'; message: string; code?: string }

export interface PollSnapshot {
  rawStatus: string
  /** Vendor failure code, consulted for content-policy classification. */
  rawCode?: string
  /** Percentage, 0-100. */
  progress?: number
  assetUrls: string[]
  message?: string
}

export interface GenerationProgressEvent {
  channel?: string
  vendor?: VendorName
  taskKind?: GenerationKind
  taskId?: string
  stage: 'upload' | 'submit' | 'poll' | 'collect' | 'done'
  status?: TaskStatus
  progress?: number
  message?: string
  usedFallback?: boolean
  timestamp?: number
}

export type ProgressEmitter = (event: Omit<GenerationProgressEvent, 'channel' | 'vendor' | 'taskKind'>) => void

export interface VendorAdapter {
  name: VendorName
  supports: GenerationKind[]
  defaultBaseUrl: string
  maxReferenceAssets: number
  /** Static lookup from the vendor's raw poll status to the neutral taxonomy. */
  statusTable: Readonly<Record<string, UpstreamStatus>>
  /** Vendor failure codes that mean the content classifier rejected the job. */
  contentPolicyCodes: ReadonlySet<string>

  buildHeaders(settings: VendorSettings): Record<string, string>
  prepare(request: GenerationRequest, settings: VendorSettings): PreparedRequest
  uploadAsset?(asset: LocalAsset, prepared: PreparedRequest, ctx: VendorContext): Promise<Omit<RemoteAssetRef, 'index' | 'sourceRef'>>
  buildSubmission(prepared: PreparedRequest, refs: RemoteAssetRef[]): SubmissionPlan
  parseSubmission(response: VendorResponse): SubmissionOutcome
  buildPollCall(taskId: string, pollParams: Readonly<Record<string, string | number>>): VendorHttpCall
  /** Returns null when the response carries no information about the task yet. */
  parsePoll(response: VendorResponse): PollSnapshot | null
  buildQuotaCall?(): VendorHttpCall
  parseQuota?(response: VendorResponse): number
}

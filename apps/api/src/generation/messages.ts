import type { Locale } from '../config/generation-config.schema'
import type { FailureCategory, GenerationRequest } from './generation.types'

interface MessageCatalog {
  failures: Record<FailureCategory, string>
  failedAtIndex: (index: number) => string
  detail: string
  taskId: string
  model: string
  kind: string
  aspectRatio: string
  resolution: string
  duration: string
  links: string
  balance: string
}

const CATALOG: Record<Locale, MessageCatalog> = {
  'zh-CN': {
    failures: {
      content_policy: '您的提示词或参考图中含有敏感内容，请修改后再试',
      submission: '任务提交失败',
      upload: '参考图上传失败',
      timeout: '生成超时，请稍后重试或手动查询任务状态',
      cancelled: '任务已被系统取消，可能您的输入参数包含敏感内容，请修改后再试',
      failed: '生成失败',
      assembly: '生成结果下载或解码失败，请检查网络或结果直链有效性',
    },
    failedAtIndex: (index) => `（第 ${index + 1} 张参考图）`,
    detail: '错误',
    taskId: '🔖 任务ID',
    model: '✨ 模型',
    kind: '🧩 类型',
    aspectRatio: '📐 比例',
    resolution: '📱 分辨率',
    duration: '⌛️ 时长',
    links: '🔗 结果链接',
    balance: '🪙 剩余积分',
  },
  en: {
    failures: {
      content_policy: 'The prompt or reference images were rejected by the content policy; please revise and retry',
      submission: 'Task submission failed',
      upload: 'Reference asset upload failed',
      timeout: 'Generation timed out; retry later or query the task status manually',
      cancelled: 'The task was cancelled upstream, possibly because of sensitive input',
      failed: 'Generation failed',
      assembly: 'Generated assets could not be downloaded or decoded',
    },
    failedAtIndex: (index) => ` (reference #${index + 1})`,
    detail: 'Error',
    taskId: '🔖 Task ID',
    model: '✨ Model',
    kind: '🧩 Kind',
    aspectRatio: '📐 Aspect ratio',
    resolution: '📱 Resolution',
    duration: '⌛️ Duration',
    links: '🔗 Result links',
    balance: '🪙 Remaining balance',
  },
}

export function catalogFor(locale: Locale): MessageCatalog {
  return CATALOG[locale] ?? CATALOG['zh-CN']
}

export interface FailureDescription {
  category: FailureCategory
  detail?: string
  index?: number
  taskId?: string
}

export function describeFailure(locale: Locale, failure: FailureDescription): string {
  const messages = catalogFor(locale)
  const headline =
    failure.index === undefined
      ? messages.failures[failure.category]
      : `${messages.failures[failure.category]}${messages.failedAtIndex(failure.index)}`
  const lines = [headline]
  if (failure.taskId) lines.push(`${messages.taskId}: ${failure.taskId}`)
  if (failure.detail && failure.detail !== headline) lines.push(`${messages.detail}: ${failure.detail}`)
  return lines.join('\n')
}

export function formatSuccessInfo(
  locale: Locale,
  request: GenerationRequest,
  model: string,
  taskId: string,
  urls: string[],
): string {
  const messages = catalogFor(locale)
  const lines = [`${messages.model}: ${model}`, `${messages.kind}: ${request.kind}`]
  if (request.aspectRatio) lines.push(`${messages.aspectRatio}: ${request.aspectRatio}`)
  if (request.resolution) lines.push(`${messages.resolution}: ${request.resolution}`)
  if (request.durationSeconds) lines.push(`${messages.duration}: ${request.durationSeconds}s`)
  lines.push(`${messages.taskId}: ${taskId}`, `${messages.links}:`)
  urls.forEach((url, i) => lines.push(`[${i}] ${url}`))
  return lines.join('\n')
}

export function formatBalance(locale: Locale, balance: number): string {
  return `${catalogFor(locale).balance}: ${balance}`
}

import { Inject, Injectable, Logger } from '@nestjs/common'
import type { AxiosInstance } from 'axios'
import { errorMessage } from '../common/exceptions/app-error'
import { HTTP_CLIENT } from '../common/http-client'
import { MEDIA_CODEC, MediaCodec } from '../media/media-codec'
import { isSuccessStatus } from './adapters/vendor-http'
import { GenerationTask } from './generation-task'
import { ResultAssemblyError } from './generation.errors'
import type { ImageFrame, TaskAsset, VideoClip } from './generation.types'

export interface CollectOptions {
  maxAssetsPerTask: number
  downloadTimeoutSeconds: number
}

export type CollectedAssets =
  | { outputKind: 'image'; assets: ImageFrame[]; urls: string[] }
  | { outputKind: 'video'; assets: [VideoClip]; urls: string[] }

/** Picks the container-looking URL when a vendor reports several for one clip. */
export function pickVideoUrl(urls: readonly [string, ...string[]]): string {
  return urls.find((url) => /\.mp4(?:$|[?#])/i.test(url)) ?? urls[0]
}

/**
 * Downloads and decodes a succeeded task's assets. All-or-nothing: any failed
 * download or decode raises ResultAssemblyError and nothing partial is returned.
 */
@Injectable()
export class ResultCollector {
  private readonly logger = new Logger(ResultCollector.name)

  constructor(
    @Inject(HTTP_CLIENT) private readonly http: AxiosInstance,
    @Inject(MEDIA_CODEC) private readonly codec: MediaCodec,
  ) {}

  async collect(task: GenerationTask, urls: string[], options: CollectOptions): Promise<CollectedAssets> {
    const usable = urls.map((url) => url.trim()).filter(Boolean)
    const [first, ...rest] = usable
    if (first === undefined) {
      throw new ResultAssemblyError('task succeeded without result links')
    }

    if (task.outputKind === 'video') {
      const url = pickVideoUrl([first, ...rest])
      const { data, contentType } = await this.download(url, 0, options)
      const clip = this.decode(() => this.codec.decodeVideo(data, url, contentType), 0)
      task.attachAssets([{ index: 0, kind: 'video', sourceRef: task.id, remoteUrl: url, bytes: data }])
      this.logger.log('video result collected', { taskId: task.id, bytes: data.length })
      return { outputKind: 'video', assets: [clip], urls: [url] }
    }

    const selected = usable.slice(0, options.maxAssetsPerTask)
    const frames: ImageFrame[] = []
    const taskAssets: TaskAsset[] = []
    for (const [index, url] of selected.entries()) {
      const { data, contentType } = await this.download(url, index, options)
      frames.push(this.decode(() => this.codec.decodeImage(data, url, contentType), index))
      taskAssets.push({ index, kind: 'image', sourceRef: task.id, remoteUrl: url, bytes: data })
    }
    task.attachAssets(taskAssets)
    this.logger.log('image results collected', { taskId: task.id, count: frames.length, reported: usable.length })
    return { outputKind: 'image', assets: frames, urls: selected }
  }

  private async download(
    url: string,
    index: number,
    options: CollectOptions,
  ): Promise<{ data: Buffer; contentType?: string }> {
    try {
      const res = await this.http.get<ArrayBuffer>(url, {
        responseType: 'arraybuffer',
        timeout: options.downloadTimeoutSeconds * 1000,
        validateStatus: () => true,
      })
      if (!isSuccessStatus(res.status)) {
        throw new Error(`HTTP ${res.status}`)
      }
      const header = res.headers['content-type']
      const contentType = typeof header === 'string' ? header.split(';')[0].trim() : undefined
      return { data: Buffer.from(res.data), contentType }
    } catch (err: unknown) {
      const message = errorMessage(err, 'download failed')
      this.logger.warn('result download failed', { url, index, message })
      throw new ResultAssemblyError(`download failed for result ${index}: ${message}`, index, { url })
    }
  }

  private decode<T>(run: () => T, index: number): T {
    try {
      return run()
    } catch (err: unknown) {
      throw new ResultAssemblyError(`decode failed for result ${index}: ${errorMessage(err)}`, index)
    }
  }
}

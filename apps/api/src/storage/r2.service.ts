import { Injectable, Logger } from '@nestjs/common'
import { PutObjectCommand, S3Client } from '@aws-sdk/client-s3'
import { randomUUID } from 'crypto'
import { errorMessage } from '../common/exceptions/app-error'
import { ConfigStore } from '../config/config-store.service'
import { extensionForMime } from '../media/media-codec'
import type { StorageSection } from '../config/generation-config.schema'

export interface UploadResult {
  key: string
  url: string
}

interface ResolvedStorage {
  section: StorageSection
  endpoint: string
  publicBaseUrl: string
}

/**
 * Hosts reference assets in an S3-compatible bucket (Cloudflare R2) for
 * vendors whose APIs take image URLs instead of uploads.
 */
@Injectable()
export class R2StorageService {
  private readonly logger = new Logger(R2StorageService.name)

  private client: S3Client | null = null
  private clientFor: StorageSection | null = null
  private warnedMissingConfig = false

  constructor(private readonly config: ConfigStore) {}

  private resolve(): ResolvedStorage | null {
    const section = this.config.current.storage
    if (!section) return null
    const endpoint = (section.endpoint || (section.accountId ? `https://${section.accountId}.r2.cloudflarestorage.com` : ''))
      .trim()
      .replace(/\/+$/, '')
    if (!section.accessKeyId || !section.secretAccessKey || !endpoint) return null
    return { section, endpoint, publicBaseUrl: (section.publicBaseUrl || '').trim().replace(/\/+$/, '') }
  }

  private ensureClient(storage: ResolvedStorage | null): S3Client | null {
    if (!storage) {
      if (!this.warnedMissingConfig) {
        this.logger.warn('R2 未配置（缺少 AccessKey/Secret/Endpoint），跳过上传')
        this.warnedMissingConfig = true
      }
      return null
    }
    // a reload produces a new frozen section, so identity tells us when to rebuild
    if (this.client && this.clientFor === storage.section) return this.client
    this.client = new S3Client({
      region: 'auto',
      endpoint: storage.endpoint,
      forcePathStyle: true,
      credentials: {
        accessKeyId: storage.section.accessKeyId,
        secretAccessKey: storage.section.secretAccessKey,
      },
    })
    this.clientFor = storage.section
    this.warnedMissingConfig = false
    return this.client
  }

  detectExtension(contentType: string, filename?: string): string {
    const known = extensionForMime(contentType)
    if (known) return known
    const parts = (filename || '').split('.')
    if (parts.length > 1) {
      const ext = parts.pop() || ''
      if (/^[a-z0-9]+$/i.test(ext)) return ext.toLowerCase()
    }
    return 'bin'
  }

  buildKey(ext: string, prefix?: string, now = new Date()): string {
    const datePrefix = `${now.getUTCFullYear()}${String(now.getUTCMonth() + 1).padStart(2, '0')}${String(now.getUTCDate()).padStart(2, '0')}`
    const dir = prefix ? prefix.replace(/^\/+|\/+$/g, '') : 'refs'
    return `${dir}/${datePrefix}/${randomUUID()}.${ext || 'bin'}`
  }

  private buildPublicUrl(storage: ResolvedStorage, key: string): string {
    if (storage.publicBaseUrl) {
      return `${storage.publicBaseUrl}/${key}`
    }
    return `${storage.endpoint}/${storage.section.bucket}/${key}`
  }

  /** Returns null when storage is not configured; upload failures propagate. */
  async uploadBuffer(params: {
    data: Buffer
    contentType?: string
    filename?: string
    prefix?: string
  }): Promise<UploadResult | null> {
    const storage = this.resolve()
    const client = this.ensureClient(storage)
    if (!client || !storage) return null

    const contentType = params.contentType || 'application/octet-stream'
    const key = this.buildKey(this.detectExtension(contentType, params.filename), params.prefix ?? storage.section.prefix)
    try {
      await client.send(
        new PutObjectCommand({
          Bucket: storage.section.bucket,
          Key: key,
          Body: params.data,
          ContentType: contentType,
          CacheControl: 'public, max-age=31536000, immutable',
        }),
      )
    } catch (err: unknown) {
      this.logger.warn('上传到 R2 失败', { message: errorMessage(err), key })
      throw err
    }
    return { key, url: this.buildPublicUrl(storage, key) }
  }
}

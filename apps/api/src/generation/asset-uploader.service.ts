import { Injectable, Logger } from '@nestjs/common'
import { errorMessage } from '../common/exceptions/app-error'
import { R2StorageService } from '../storage/r2.service'
import { AssetUploadError } from './generation.errors'
import type {
  LocalAsset,
  PreparedRequest,
  ProgressEmitter,
  RemoteAssetRef,
  VendorAdapter,
  VendorContext,
} from './generation.types'

/**
 * Turns local reference assets into vendor-reachable references, in input
 * order. The first failure aborts the batch; nothing after it is uploaded.
 */
@Injectable()
export class AssetUploader {
  private readonly logger = new Logger(AssetUploader.name)

  constructor(private readonly storage: R2StorageService) {}

  async uploadAll(
    adapter: VendorAdapter,
    prepared: PreparedRequest,
    ctx: VendorContext,
    emit?: ProgressEmitter,
  ): Promise<RemoteAssetRef[]> {
    const assets = prepared.request.referenceAssets ?? []
    const refs: RemoteAssetRef[] = []
    for (const [index, asset] of assets.entries()) {
      emit?.({ stage: 'upload', message: `uploading reference ${index + 1}/${assets.length}` })
      try {
        const uploaded = await this.uploadOne(adapter, asset, prepared, ctx)
        refs.push({ index, sourceRef: asset.sourceRef, ...uploaded })
      } catch (err: unknown) {
        const message = errorMessage(err, 'upload failed')
        this.logger.warn('reference asset upload failed', {
          vendor: adapter.name,
          index,
          sourceRef: asset.sourceRef,
          message,
        })
        throw new AssetUploadError(index, message, { sourceRef: asset.sourceRef })
      }
    }
    if (refs.length) {
      this.logger.log('reference assets uploaded', { vendor: adapter.name, count: refs.length })
    }
    return refs
  }

  private async uploadOne(
    adapter: VendorAdapter,
    asset: LocalAsset,
    prepared: PreparedRequest,
    ctx: VendorContext,
  ): Promise<Omit<RemoteAssetRef, 'index' | 'sourceRef'>> {
    if (!asset.data.length) {
      throw new Error(`reference ${asset.sourceRef} is empty`)
    }
    if (adapter.uploadAsset) {
      return adapter.uploadAsset(asset, prepared, ctx)
    }
    const mimeType = asset.mimeType || 'image/png'
    const hosted = await this.storage.uploadBuffer({
      data: asset.data,
      contentType: mimeType,
      filename: asset.filename,
    })
    if (hosted) return { url: hosted.url }
    return { url: `data:${mimeType};base64,${asset.data.toString('base64')}` }
  }
}

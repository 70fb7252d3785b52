import { ConfigStore } from '../config/config-store.service'
import { R2StorageService, UploadResult } from '../storage/r2.service'
import { createFakeAdapter, FAKE_SETTINGS } from '../testing/fake-adapter'
import { createHttpStub } from '../testing/http-stub'
import { AssetUploader } from './asset-uploader.service'
import { AssetUploadError } from './generation.errors'
import type { GenerationRequest, LocalAsset, PreparedRequest } from './generation.types'

class RecordingStorage extends R2StorageService {
  readonly uploads: Buffer[] = []

  constructor(private readonly hostedBase: string | null) {
    super(new ConfigStore({ raw: {}, env: {} }))
  }

  override async uploadBuffer(params: { data: Buffer }): Promise<UploadResult | null> {
    if (!this.hostedBase) return null
    this.uploads.push(params.data)
    return { key: `refs/${this.uploads.length}`, url: `${this.hostedBase}/refs/${this.uploads.length}` }
  }
}

const assets = (count: number): LocalAsset[] =>
  Array.from({ length: count }, (_, i) => ({ sourceRef: `ref-${i}`, data: Buffer.from(`image-${i}`), mimeType: 'image/png' }))

const prepared = (referenceAssets: LocalAsset[]): PreparedRequest => {
  const request: GenerationRequest = { vendor: 'dashscope', kind: 'multi_reference_video', prompt: 'p', referenceAssets }
  return { request, model: 'fake-model', modelSettings: {} }
}

const ctx = { http: createHttpStub(() => ({})).http, settings: FAKE_SETTINGS, timeoutMs: 1000 }

describe('AssetUploader', () => {
  it('uploads through the vendor and keeps input order', async () => {
    const seen: string[] = []
    const adapter = createFakeAdapter({
      uploadAsset: async (asset) => {
        seen.push(asset.sourceRef)
        return { url: `https://vendor.test/assets/${asset.sourceRef}` }
      },
    })
    const uploader = new AssetUploader(new RecordingStorage(null))

    const refs = await uploader.uploadAll(adapter, prepared(assets(3)), ctx)

    expect(seen).toEqual(['ref-0', 'ref-1', 'ref-2'])
    expect(refs).toEqual([
      { index: 0, sourceRef: 'ref-0', url: 'https://vendor.test/assets/ref-0' },
      { index: 1, sourceRef: 'ref-1', url: 'https://vendor.test/assets/ref-1' },
      { index: 2, sourceRef: 'ref-2', url: 'https://vendor.test/assets/ref-2' },
    ])
  })

  it('stops at the first failure and reports its index', async () => {
    const seen: string[] = []
    const adapter = createFakeAdapter({
      uploadAsset: async (asset) => {
        seen.push(asset.sourceRef)
        if (asset.sourceRef === 'ref-2') throw new Error('presign expired')
        return { url: `https://vendor.test/assets/${asset.sourceRef}` }
      },
    })
    const uploader = new AssetUploader(new RecordingStorage(null))

    const error = await uploader.uploadAll(adapter, prepared(assets(4)), ctx).catch((err: unknown) => err)

    expect(error).toBeInstanceOf(AssetUploadError)
    expect(error).toMatchObject({ index: 2, message: 'presign expired' })
    expect(seen).toEqual(['ref-0', 'ref-1', 'ref-2'])
  })

  it('rejects empty payloads before contacting anyone', async () => {
    const uploadAsset = jest.fn(async () => ({ url: 'https://vendor.test/x' }))
    const uploader = new AssetUploader(new RecordingStorage(null))
    const empty = [{ sourceRef: 'blank', data: Buffer.alloc(0) }]

    await expect(uploader.uploadAll(createFakeAdapter({ uploadAsset }), prepared(empty), ctx)).rejects.toMatchObject({
      index: 0,
    })
    expect(uploadAsset).not.toHaveBeenCalled()
  })

  it('hosts references in object storage when the vendor has no upload API', async () => {
    const storage = new RecordingStorage('https://cdn.test')
    const refs = await new AssetUploader(storage).uploadAll(createFakeAdapter(), prepared(assets(2)), ctx)

    expect(refs.map((ref) => ref.url)).toEqual(['https://cdn.test/refs/1', 'https://cdn.test/refs/2'])
    expect(storage.uploads).toHaveLength(2)
  })

  it('inlines references as data URIs when storage is not configured', async () => {
    const refs = await new AssetUploader(new RecordingStorage(null)).uploadAll(createFakeAdapter(), prepared(assets(1)), ctx)
    expect(refs[0].url).toBe(`data:image/png;base64,${Buffer.from('image-0').toString('base64')}`)
  })

  it('returns nothing for requests without references', async () => {
    const refs = await new AssetUploader(new RecordingStorage(null)).uploadAll(createFakeAdapter(), prepared([]), ctx)
    expect(refs).toEqual([])
  })
})

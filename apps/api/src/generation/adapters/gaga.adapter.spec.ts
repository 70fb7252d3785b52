import FormData from 'form-data'
import { createHttpStub } from '../../testing/http-stub'
import type { GenerationRequest, VendorSettings } from '../generation.types'
import { computeCrop, gagaAdapter } from './gaga.adapter'

const settings: VendorSettings = {
  baseUrl: 'https://gaga.test',
  credential: 'session=test-secret',
  headers: {},
  models: {},
  defaults: { resolution: '540p', nSampleSteps: 24 },
}

const request = (overrides: Partial<GenerationRequest> = {}): GenerationRequest => ({
  vendor: 'gaga',
  kind: 'image_to_video',
  prompt: 'she turns and smiles',
  referenceAssets: [{ sourceRef: 'portrait', data: Buffer.from('png-bytes'), mimeType: 'image/png' }],
  ...overrides,
})

describe('computeCrop', () => {
  it('keeps the full width when the 16:9 height fits', () => {
    expect(computeCrop(1920, 1080)).toEqual({ x: 0, y: 0, width: 1920, height: 1080 })
    expect(computeCrop(1000, 1000)).toEqual({ x: 0, y: 0, width: 1000, height: 563 })
  })

  it('derives the width from the height on wide images and clamps the origin', () => {
    expect(computeCrop(800, 400)).toEqual({ x: 0, y: 0, width: 711, height: 400 })
    expect(computeCrop(800, 400, 500, 50)).toEqual({ x: 89, y: 0, width: 711, height: 400 })
  })
})

describe('gagaAdapter', () => {
  it('only offers image-to-video with a single reference', () => {
    expect(() => gagaAdapter.prepare(request({ kind: 'text_to_video' }), settings)).toThrow('gaga 不支持 text_to_video')
    expect(() => gagaAdapter.prepare(request({ referenceAssets: [] }), settings)).toThrow('需要至少一张参考图')
  })

  it('uploads the reference as multipart form data', async () => {
    const stub = createHttpStub(() => ({ data: { id: 77, width: 1280, height: 960, url: 'https://gaga.test/a/77.png' } }))
    const prepared = gagaAdapter.prepare(request(), settings)
    const asset = request().referenceAssets?.[0]
    if (!asset) throw new Error('fixture has no reference')

    const uploaded = await gagaAdapter.uploadAsset?.(asset, prepared, { http: stub.http, settings, timeoutMs: 1000 })

    expect(uploaded).toEqual({ url: 'https://gaga.test/a/77.png', vendorAssetId: '77', width: 1280, height: 960 })
    expect(stub.calls[0].url).toBe('https://gaga.test/api/v1/assets')
    expect(stub.calls[0].body).toBeInstanceOf(FormData)
    expect(String(stub.calls[0].headers.get('content-type'))).toMatch(/^multipart\/form-data; boundary=/)
    expect(stub.calls[0].headers.get('cookie')).toBe('session=test-secret')
  })

  it('rejects upload replies without dimensions', async () => {
    const stub = createHttpStub(() => ({ data: { id: 77 } }))
    const prepared = gagaAdapter.prepare(request(), settings)
    await expect(
      gagaAdapter.uploadAsset?.({ sourceRef: 'p', data: Buffer.from('x') }, prepared, {
        http: stub.http,
        settings,
        timeoutMs: 1000,
      }),
    ).rejects.toThrow('上传图片响应异常')
  })

  it('builds the performer payload with a 16:9 crop of the uploaded image', () => {
    const prepared = gagaAdapter.prepare(request({ durationSeconds: 5 }), settings)
    const plan = gagaAdapter.buildSubmission(prepared, [
      { index: 0, sourceRef: 'portrait', url: 'https://gaga.test/a/77.png', vendorAssetId: '77', width: 1280, height: 960 },
    ])

    expect(plan.call.path).toBe('/api/v1/generations/performer')
    expect(plan.call.body).toMatchObject({
      model: 'test-performer',
      aspectRatio: '16:9',
      taskType: 'I2FV',
      source: { type: 'image', content: '77' },
      chunks: [{ duration: 5, conditions: [{ type: 'text', content: 'she turns and smiles' }] }],
      extraArgs: {
        enablePromptEnhancement: true,
        cropArea: { x: 0, y: 0, width: 1280, height: 720 },
        extraInferArgs: { nSampleSteps: 24, resolution: '540p', enableWatermark: false },
      },
    })
  })

  describe('parseSubmission', () => {
    it('accepts numeric generation ids', () => {
      expect(gagaAdapter.parseSubmission({ status: 200, data: { id: 4242 } })).toEqual({ kind: 'accepted', taskId: '4242' })
    })

    it('treats HTTP 451 and sensitive messages as content-policy rejections', () => {
      expect(gagaAdapter.parseSubmission({ status: 451, data: {} }).kind).toBe('content_policy')
      expect(gagaAdapter.parseSubmission({ status: 400, data: { message: 'prompt contains sensitive words' } })).toEqual({
        kind: 'content_policy',
        message: 'prompt contains sensitive words',
        code: '451',
      })
    })

    it('rejects replies without an id', () => {
      expect(gagaAdapter.parseSubmission({ status: 200, data: {} })).toEqual({
        kind: 'rejected',
        message: '提交任务异常：响应中缺少id字段',
      })
    })
  })

  describe('parsePoll', () => {
    it('reads the video link from either location', () => {
      expect(
        gagaAdapter.parsePoll({ status: 200, data: { status: 'Success', resultVideoURL: 'https://cdn.test/v.mp4' } })?.assetUrls,
      ).toEqual(['https://cdn.test/v.mp4'])
      expect(
        gagaAdapter.parsePoll({ status: 200, data: { status: 'Success', result: { videoURL: 'https://cdn.test/w.mp4' } } })
          ?.assetUrls,
      ).toEqual(['https://cdn.test/w.mp4'])
    })

    it('flags sensitive failure messages', () => {
      expect(
        gagaAdapter.parsePoll({ status: 200, data: { status: 'Failed', message: '内容涉及敏感信息' } })?.rawCode,
      ).toBe('ContentPolicy')
    })

    it('throws on non-2xx replies', () => {
      expect(() => gagaAdapter.parsePoll({ status: 429, data: {} })).toThrow('轮询请求失败: HTTP 429')
    })
  })
})

import { ConfigurationError } from '../generation.errors'
import type { GenerationRequest, LocalAsset, VendorSettings } from '../generation.types'
import { dashscopeAdapter } from './dashscope.adapter'
import { gagaAdapter } from './gaga.adapter'
import { haiyiAdapter } from './haiyi.adapter'
import { classifyUpstream, clampProgress, describeHttpFailure, resolveModelName, resolveReferences } from './vendor-http'

const asset = (sourceRef: string): LocalAsset => ({ sourceRef, data: Buffer.from('x') })

const request = (overrides: Partial<GenerationRequest>): GenerationRequest => ({
  vendor: 'haiyi',
  kind: 'text_to_image',
  prompt: 'a red fox',
  ...overrides,
})

const settings = (overrides: Partial<VendorSettings> = {}): VendorSettings => ({
  baseUrl: 'https://vendor.test',
  credential: 'test-secret',
  headers: {},
  models: {},
  defaults: {},
  ...overrides,
})

describe('classifyUpstream', () => {
  it('maps haiyi numeric statuses through the static table', () => {
    expect(classifyUpstream(haiyiAdapter, { rawStatus: '1', assetUrls: [] })).toBe('running')
    expect(classifyUpstream(haiyiAdapter, { rawStatus: '2', assetUrls: [] })).toBe('running')
    expect(classifyUpstream(haiyiAdapter, { rawStatus: '3', assetUrls: [] })).toBe('success')
    expect(classifyUpstream(haiyiAdapter, { rawStatus: '4', assetUrls: [] })).toBe('upstream-cancelled')
  })

  it('treats unknown codes as generic failures, including prototype keys', () => {
    expect(classifyUpstream(haiyiAdapter, { rawStatus: '9', assetUrls: [] })).toBe('generic-failure')
    expect(classifyUpstream(dashscopeAdapter, { rawStatus: 'toString', assetUrls: [] })).toBe('generic-failure')
  })

  it('lets a content-policy code win over the raw status', () => {
    expect(
      classifyUpstream(dashscopeAdapter, { rawStatus: 'FAILED', rawCode: 'DataInspectionFailed', assetUrls: [] }),
    ).toBe('content-policy-rejected')
    expect(classifyUpstream(gagaAdapter, { rawStatus: 'Failed', rawCode: 'ContentPolicy', assetUrls: [] })).toBe(
      'content-policy-rejected',
    )
  })

  it('maps identical snapshots identically', () => {
    const snapshot = { rawStatus: 'RUNNING', assetUrls: [] }
    expect(classifyUpstream(dashscopeAdapter, snapshot)).toBe(classifyUpstream(dashscopeAdapter, { ...snapshot }))
  })
})

describe('resolveReferences', () => {
  it('drops references on text-only kinds', () => {
    expect(resolveReferences(haiyiAdapter, request({ referenceAssets: [asset('a')] }))).toEqual([])
  })

  it('requires a reference for image-conditioned kinds', () => {
    expect(() => resolveReferences(haiyiAdapter, request({ kind: 'image_to_video' }))).toThrow(ConfigurationError)
  })

  it('allows one reference on single-reference kinds', () => {
    expect(() =>
      resolveReferences(haiyiAdapter, request({ kind: 'image_edit', referenceAssets: [asset('a'), asset('b')] })),
    ).toThrow('仅支持一张参考图')
  })

  it('caps multi-reference requests at the vendor limit', () => {
    const refs = ['a', 'b', 'c', 'd', 'e'].map(asset)
    expect(() => resolveReferences(haiyiAdapter, request({ kind: 'multi_reference_video', referenceAssets: refs }))).toThrow(
      '最多支持 4 张参考图',
    )
    expect(
      resolveReferences(haiyiAdapter, request({ kind: 'multi_reference_video', referenceAssets: refs.slice(0, 4) })),
    ).toHaveLength(4)
  })
})

describe('resolveModelName', () => {
  it('prefers the request, then kind defaults, then the generic default', () => {
    const configured = settings({ defaults: { model: 'generic', text_to_videoModel: 'video-default' } })
    expect(resolveModelName(request({ model: ' explicit ' }), configured)).toBe('explicit')
    expect(resolveModelName(request({ kind: 'text_to_video' }), configured)).toBe('video-default')
    expect(resolveModelName(request({}), configured)).toBe('generic')
  })

  it('falls back to the adapter default and then the first configured model', () => {
    expect(resolveModelName(request({}), settings(), 'builtin')).toBe('builtin')
    expect(resolveModelName(request({}), settings({ models: { first: {}, second: {} } }))).toBe('first')
    expect(() => resolveModelName(request({}), settings())).toThrow(ConfigurationError)
  })
})

describe('response helpers', () => {
  it('prefers the vendor message over the HTTP status', () => {
    expect(describeHttpFailure({ status: 500, data: { message: ' boom ' } }, 'poll')).toBe('boom')
    expect(describeHttpFailure({ status: 502, data: 'bad gateway' }, 'poll')).toBe('poll: HTTP 502')
  })

  it('clamps progress percentages without rescaling them', () => {
    expect(clampProgress(1)).toBe(1)
    expect(clampProgress(0.5)).toBe(0.5)
    expect(clampProgress(42)).toBe(42)
    expect(clampProgress(150)).toBe(100)
    expect(clampProgress(-3)).toBe(0)
    expect(clampProgress(undefined)).toBeUndefined()
  })
})

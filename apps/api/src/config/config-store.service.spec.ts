import { mkdtempSync, writeFileSync } from 'fs'
import { tmpdir } from 'os'
import { join } from 'path'
import { ConfigurationError } from '../generation/generation.errors'
import { ConfigStore } from './config-store.service'

describe('ConfigStore', () => {
  it('fills defaults for an empty config', () => {
    const store = new ConfigStore({ raw: {}, env: {} })
    expect(store.current).toMatchObject({
      timeoutSeconds: 30,
      downloadTimeoutSeconds: 120,
      maxWaitSeconds: 300,
      pollIntervalSeconds: 2,
      maxAssetsPerTask: 4,
      defaultPlaceholderSize: { width: 256, height: 256 },
      locale: 'zh-CN',
      vendors: {},
    })
  })

  it('rejects out-of-range values with a configuration error', () => {
    expect(() => new ConfigStore({ raw: { maxAssetsPerTask: 9 }, env: {} })).toThrow(ConfigurationError)
    expect(() => new ConfigStore({ raw: { pollIntervalSeconds: 0 }, env: {} })).toThrow('pollIntervalSeconds')
    expect(
      () => new ConfigStore({ raw: { defaultPlaceholderSize: { width: 200_000, height: 200_000 } }, env: {} }),
    ).toThrow('defaultPlaceholderSize.width')
    expect(
      new ConfigStore({ raw: { defaultPlaceholderSize: { width: 4096, height: 4096 } }, env: {} }).current
        .defaultPlaceholderSize,
    ).toEqual({ width: 4096, height: 4096 })
  })

  it('requires a credential for the vendor being used', () => {
    const store = new ConfigStore({ raw: { vendors: { haiyi: { credential: '  ' } } }, env: {} })
    expect(() => store.requireVendor('haiyi', 'https://haiyi.test')).toThrow('HAIYI_COOKIE')
    expect(() => store.requireVendor('gaga', 'https://gaga.test')).toThrow(ConfigurationError)
  })

  it('applies credential and storage overrides from the environment', () => {
    const store = new ConfigStore({
      raw: { vendors: { dashscope: { baseUrl: 'https://dash.test/' } } },
      env: { DASHSCOPE_API_KEY: 'test-secret', R2_BUCKET: 'refs-bucket' },
    })
    expect(store.requireVendor('dashscope', 'https://default.test')).toEqual({
      baseUrl: 'https://dash.test',
      credential: 'test-secret',
      headers: {},
      models: {},
      defaults: {},
    })
    expect(store.current.storage?.bucket).toBe('refs-bucket')
    expect(store.current.storage?.prefix).toBe('refs')
  })

  it('falls back to the adapter base URL', () => {
    const store = new ConfigStore({ raw: { vendors: { gaga: { credential: 'test-secret' } } }, env: {} })
    expect(store.requireVendor('gaga', 'https://gaga.test').baseUrl).toBe('https://gaga.test')
  })

  it('swaps the snapshot on reload and leaves the previous one intact', () => {
    const dir = mkdtempSync(join(tmpdir(), 'genflow-config-'))
    const path = join(dir, 'generation.config.json')
    writeFileSync(path, JSON.stringify({ maxWaitSeconds: 60 }))
    const store = new ConfigStore({ path, env: {} })
    const before = store.current

    writeFileSync(path, JSON.stringify({ maxWaitSeconds: 90, locale: 'en' }))
    const after = store.reload()

    expect(before.maxWaitSeconds).toBe(60)
    expect(after.maxWaitSeconds).toBe(90)
    expect(store.current.locale).toBe('en')
    expect(Object.isFrozen(before)).toBe(true)
  })

  it('reports malformed JSON files as configuration errors', () => {
    const dir = mkdtempSync(join(tmpdir(), 'genflow-config-'))
    const path = join(dir, 'broken.json')
    writeFileSync(path, '{ not json')
    expect(() => new ConfigStore({ path, env: {} })).toThrow('not valid JSON')
  })

  it('uses defaults when the file is missing', () => {
    const store = new ConfigStore({ path: join(tmpdir(), 'genflow-missing', 'none.json'), env: {} })
    expect(store.current.vendors).toEqual({})
  })
})

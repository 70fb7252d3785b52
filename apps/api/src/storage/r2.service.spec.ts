import { PutObjectCommand, S3Client } from '@aws-sdk/client-s3'
import { ConfigStore } from '../config/config-store.service'
import { R2StorageService } from './r2.service'

const storageConfig = {
  storage: {
    accountId: 'acct',
    accessKeyId: 'test-key',
    secretAccessKey: 'test-secret',
    publicBaseUrl: 'https://assets.test/',
  },
}

describe('R2StorageService', () => {
  afterEach(() => jest.restoreAllMocks())

  it('skips uploads when storage is not configured', async () => {
    const service = new R2StorageService(new ConfigStore({ raw: {}, env: {} }))
    await expect(service.uploadBuffer({ data: Buffer.from('x') })).resolves.toBeNull()
  })

  it('derives extensions from the content type, then the file name', () => {
    const service = new R2StorageService(new ConfigStore({ raw: {}, env: {} }))
    expect(service.detectExtension('image/jpeg')).toBe('jpg')
    expect(service.detectExtension('application/octet-stream', 'frame.WEBP')).toBe('webp')
    expect(service.detectExtension('application/octet-stream')).toBe('bin')
  })

  it('builds date-partitioned keys under the prefix', () => {
    const service = new R2StorageService(new ConfigStore({ raw: {}, env: {} }))
    const key = service.buildKey('png', '/refs/', new Date(Date.UTC(2026, 0, 5)))
    expect(key).toMatch(/^refs\/20260105\/[0-9a-f-]{36}\.png$/)
  })

  it('puts the object and returns its public URL', async () => {
    const send = jest.spyOn(S3Client.prototype, 'send').mockImplementation(async () => ({}))
    const service = new R2StorageService(new ConfigStore({ raw: storageConfig, env: {} }))

    const uploaded = await service.uploadBuffer({ data: Buffer.from('png'), contentType: 'image/png' })

    expect(uploaded?.url).toBe(`https://assets.test/${uploaded?.key}`)
    expect(uploaded?.key).toMatch(/^refs\/\d{8}\/[0-9a-f-]{36}\.png$/)
    expect(send).toHaveBeenCalledTimes(1)
    const command: unknown = send.mock.calls[0][0]
    expect(command).toBeInstanceOf(PutObjectCommand)
    expect(command).toMatchObject({ input: { Bucket: 'genflow', ContentType: 'image/png', Key: uploaded?.key } })
  })

  it('propagates storage failures', async () => {
    jest.spyOn(S3Client.prototype, 'send').mockImplementation(async () => {
      throw new Error('AccessDenied')
    })
    const service = new R2StorageService(new ConfigStore({ raw: storageConfig, env: {} }))
    await expect(service.uploadBuffer({ data: Buffer.from('png') })).rejects.toThrow('AccessDenied')
  })
})

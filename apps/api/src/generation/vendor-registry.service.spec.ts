import { ConfigurationError } from './generation.errors'
import { VendorRegistry } from './vendor-registry.service'

describe('VendorRegistry', () => {
  const registry = new VendorRegistry()

  it('resolves every built-in vendor', () => {
    expect(registry.names()).toEqual(['haiyi', 'dashscope', 'gaga'])
    expect(registry.resolve('gaga').supports).toEqual(['image_to_video'])
  })

  it('rejects unknown vendors as configuration errors', () => {
    expect(() => registry.resolve('midjourney')).toThrow(ConfigurationError)
    expect(() => registry.resolve('midjourney')).toThrow('未知的服务商：midjourney，可用：haiyi, dashscope, gaga')
  })
})

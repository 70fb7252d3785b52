import { Injectable } from '@nestjs/common'
import { dashscopeAdapter } from './adapters/dashscope.adapter'
import { gagaAdapter } from './adapters/gaga.adapter'
import { haiyiAdapter } from './adapters/haiyi.adapter'
import { ConfigurationError } from './generation.errors'
import type { VendorAdapter } from './generation.types'

@Injectable()
export class VendorRegistry {
  private readonly adapters = new Map<string, VendorAdapter>(
    [haiyiAdapter, dashscopeAdapter, gagaAdapter].map((adapter): [string, VendorAdapter] => [adapter.name, adapter]),
  )

  resolve(vendor: string): VendorAdapter {
    const adapter = this.adapters.get(vendor)
    if (!adapter) {
      throw new ConfigurationError(`未知的服务商：${vendor}，可用：${this.names().join(', ')}`)
    }
    return adapter
  }

  names(): string[] {
    return [...this.adapters.keys()]
  }
}

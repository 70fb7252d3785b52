import { Inject, Injectable, Logger } from '@nestjs/common'
import { CLOCK, Clock } from '../common/clock'
import { errorMessage } from '../common/exceptions/app-error'
import { sendVendorCall } from './adapters/vendor-http'
import { QuotaProbeError } from './generation.errors'
import type { QuotaSnapshot, VendorAdapter, VendorContext } from './generation.types'

/** Best-effort balance lookup; a failed probe only costs the info line. */
@Injectable()
export class QuotaProber {
  private readonly logger = new Logger(QuotaProber.name)

  constructor(@Inject(CLOCK) private readonly clock: Clock) {}

  /** Null when the vendor has no quota endpoint; never throws. */
  async probe(adapter: VendorAdapter, ctx: VendorContext): Promise<QuotaSnapshot | null> {
    if (!adapter.buildQuotaCall || !adapter.parseQuota) return null
    try {
      const balance = adapter.parseQuota(await sendVendorCall(adapter, ctx, adapter.buildQuotaCall()))
      return { ok: true, balance, queriedAt: this.clock.now() }
    } catch (err: unknown) {
      const failure = new QuotaProbeError(`${adapter.name} quota probe failed: ${errorMessage(err)}`, {
        vendor: adapter.name,
      })
      this.logger.warn(failure.message, { code: failure.code })
      return { ok: false, balance: 0, queriedAt: this.clock.now() }
    }
  }
}

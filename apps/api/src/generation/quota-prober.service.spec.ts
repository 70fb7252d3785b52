import { createFakeAdapter, FAKE_SETTINGS } from '../testing/fake-adapter'
import { createHttpStub, StubHandler } from '../testing/http-stub'
import { VirtualClock } from '../testing/virtual-clock'
import { QuotaProber } from './quota-prober.service'

const withQuota = createFakeAdapter({
  buildQuotaCall: () => ({ method: 'GET', path: '/quota' }),
  parseQuota: (response) => {
    if (response.status !== 200) throw new Error(`HTTP ${response.status}`)
    return 321
  },
})

const ctxWith = (handler: StubHandler) => ({ http: createHttpStub(handler).http, settings: FAKE_SETTINGS, timeoutMs: 1000 })

describe('QuotaProber', () => {
  const prober = new QuotaProber(new VirtualClock(5_000))

  it('returns a snapshot of the balance', async () => {
    await expect(prober.probe(withQuota, ctxWith(() => ({})))).resolves.toEqual({
      ok: true,
      balance: 321,
      queriedAt: 5_000,
    })
  })

  it('reports failed probes without throwing', async () => {
    const failed = { ok: false, balance: 0, queriedAt: 5_000 }
    await expect(prober.probe(withQuota, ctxWith(() => ({ status: 401 })))).resolves.toEqual(failed)
    await expect(
      prober.probe(
        withQuota,
        ctxWith(() => {
          throw new Error('timeout of 1000ms exceeded')
        }),
      ),
    ).resolves.toEqual(failed)
  })

  it('skips vendors without a quota endpoint', async () => {
    const handler = jest.fn(() => ({}))
    await expect(prober.probe(createFakeAdapter(), ctxWith(handler))).resolves.toBeNull()
    expect(handler).not.toHaveBeenCalled()
  })
})

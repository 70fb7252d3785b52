import { Inject, Injectable, Logger } from '@nestjs/common'
import { CLOCK, Clock } from '../common/clock'
import { errorMessage } from '../common/exceptions/app-error'
import { classifyUpstream, clampProgress, sendVendorCall } from './adapters/vendor-http'
import { GenerationTask } from './generation-task'
import type { PollSnapshot, PollState, ProgressEmitter, UpstreamStatus, VendorAdapter, VendorContext } from './generation.types'

export interface PollOptions {
  maxWaitSeconds: number
  intervalSeconds: number
}

export interface PollOutcome {
  state: PollState
  /** Result URLs reported with the success status; empty otherwise. */
  assetUrls: string[]
  upstream?: UpstreamStatus
  message?: string
}

/**
 * Queries a submitted task until it reaches a terminal state or the wait budget
 * runs out. Each round waits one interval (never past the budget) before
 * querying, and each query's timeout is cut to what is left of
 * maxWait + interval, so the loop always ends within that bound.
 */
@Injectable()
export class Poller {
  private readonly logger = new Logger(Poller.name)

  constructor(@Inject(CLOCK) private readonly clock: Clock) {}

  async poll(
    adapter: VendorAdapter,
    task: GenerationTask,
    pollParams: Readonly<Record<string, string | number>>,
    ctx: VendorContext,
    options: PollOptions,
    emit?: ProgressEmitter,
  ): Promise<PollOutcome> {
    const state: PollState = {
      attempts: 0,
      misses: 0,
      elapsedSeconds: 0,
      intervalSeconds: options.intervalSeconds,
      maxWaitSeconds: options.maxWaitSeconds,
    }
    const call = adapter.buildPollCall(task.id, pollParams)
    const deadline = task.submittedAt + (options.maxWaitSeconds + options.intervalSeconds) * 1000
    let lastRaw: string | undefined

    for (;;) {
      if (this.exhausted(state, task)) return this.timeOut(adapter, task, state, emit)

      const budgetLeft = task.submittedAt + state.maxWaitSeconds * 1000 - this.clock.now()
      await this.clock.sleep(Math.min(state.intervalSeconds * 1000, budgetLeft))
      if (this.exhausted(state, task)) return this.timeOut(adapter, task, state, emit)
      state.attempts += 1

      let snapshot: PollSnapshot | null
      try {
        const timeoutMs = Math.min(ctx.timeoutMs, deadline - this.clock.now())
        snapshot = adapter.parsePoll(await sendVendorCall(adapter, { ...ctx, timeoutMs }, call))
      } catch (err: unknown) {
        state.misses += 1
        this.logger.debug('poll attempt failed, retrying next interval', {
          taskId: task.id,
          attempt: state.attempts,
          message: errorMessage(err),
        })
        continue
      }
      if (!snapshot) {
        state.misses += 1
        continue
      }

      const upstream = classifyUpstream(adapter, snapshot)
      if (snapshot.rawStatus !== lastRaw) {
        lastRaw = snapshot.rawStatus
        this.logger.log('generation task status', {
          vendor: adapter.name,
          taskId: task.id,
          raw: snapshot.rawStatus,
          upstream,
        })
      }

      switch (upstream) {
        case 'running':
          task.transition('running')
          emit?.({ stage: 'poll', taskId: task.id, status: task.status, progress: clampProgress(snapshot.progress) })
          continue
        case 'success':
          task.transition('succeeded')
          emit?.({ stage: 'poll', taskId: task.id, status: task.status, progress: 100 })
          return { state, assetUrls: snapshot.assetUrls, upstream, message: snapshot.message }
        case 'upstream-cancelled':
          task.transition('cancelled', { category: 'cancelled', message: snapshot.message, code: snapshot.rawCode })
          break
        case 'content-policy-rejected':
          task.transition('failed', { category: 'content_policy', message: snapshot.message, code: snapshot.rawCode })
          break
        case 'generic-failure':
          task.transition('failed', {
            category: 'failed',
            message: snapshot.message ?? `status ${snapshot.rawStatus}`,
            code: snapshot.rawCode,
          })
          break
      }
      emit?.({ stage: 'poll', taskId: task.id, status: task.status, message: snapshot.message })
      return { state, assetUrls: [], upstream, message: snapshot.message }
    }
  }

  /** Refreshes elapsed time; true once the wait budget is spent. */
  private exhausted(state: PollState, task: GenerationTask): boolean {
    state.elapsedSeconds = Math.max(state.elapsedSeconds, (this.clock.now() - task.submittedAt) / 1000)
    return state.elapsedSeconds >= state.maxWaitSeconds
  }

  private timeOut(adapter: VendorAdapter, task: GenerationTask, state: PollState, emit?: ProgressEmitter): PollOutcome {
    task.transition('timed_out', { category: 'timeout' })
    this.logger.warn('generation task timed out', {
      vendor: adapter.name,
      taskId: task.id,
      attempts: state.attempts,
      elapsedSeconds: state.elapsedSeconds,
    })
    emit?.({ stage: 'poll', taskId: task.id, status: task.status })
    return { state, assetUrls: [] }
  }
}

import { Inject, Injectable, Logger } from '@nestjs/common'
import { CLOCK, Clock } from '../common/clock'
import { errorMessage } from '../common/exceptions/app-error'
import { sendVendorCall } from './adapters/vendor-http'
import { GenerationTask } from './generation-task'
import { ContentPolicyRejection, SubmissionError } from './generation.errors'
import type { PreparedRequest, RemoteAssetRef, SubmissionOutcome, VendorAdapter, VendorContext } from './generation.types'
import { OUTPUT_KIND } from './generation.types'

export type SubmitResult =
  | { ok: true; task: GenerationTask; pollParams: Readonly<Record<string, string | number>> }
  | { ok: false; error: ContentPolicyRejection | SubmissionError }

@Injectable()
export class TaskSubmitter {
  private readonly logger = new Logger(TaskSubmitter.name)

  constructor(@Inject(CLOCK) private readonly clock: Clock) {}

  /** Sends one creation request. Never throws for vendor or transport problems. */
  async submit(
    adapter: VendorAdapter,
    prepared: PreparedRequest,
    refs: RemoteAssetRef[],
    ctx: VendorContext,
  ): Promise<SubmitResult> {
    const plan = adapter.buildSubmission(prepared, refs)
    this.logger.log('submitting generation task', {
      vendor: adapter.name,
      kind: prepared.request.kind,
      model: prepared.model,
      refs: refs.length,
    })

    let outcome: SubmissionOutcome
    try {
      const response = await sendVendorCall(adapter, ctx, plan.call)
      outcome = adapter.parseSubmission(response)
    } catch (err: unknown) {
      const message = errorMessage(err, 'submission request failed')
      this.logger.warn('generation submission transport error', { vendor: adapter.name, message })
      return { ok: false, error: new SubmissionError(message) }
    }

    switch (outcome.kind) {
      case 'accepted': {
        const task = new GenerationTask(outcome.taskId, OUTPUT_KIND[prepared.request.kind], this.clock.now())
        this.logger.log('generation task accepted', { vendor: adapter.name, taskId: task.id })
        return { ok: true, task, pollParams: plan.pollParams }
      }
      case 'content_policy':
        this.logger.warn('generation task rejected by content policy', {
          vendor: adapter.name,
          code: outcome.code,
        })
        return { ok: false, error: new ContentPolicyRejection(outcome.message, { code: outcome.code }) }
      case 'rejected':
        this.logger.warn('generation task rejected', { vendor: adapter.name, message: outcome.message })
        return { ok: false, error: new SubmissionError(outcome.message, { code: outcome.code }) }
    }
  }
}

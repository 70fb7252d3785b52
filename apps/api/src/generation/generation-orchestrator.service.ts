import { Inject, Injectable, Logger } from '@nestjs/common'
import type { AxiosInstance } from 'axios'
import { errorMessage } from '../common/exceptions/app-error'
import { HTTP_CLIENT } from '../common/http-client'
import { ConfigStore } from '../config/config-store.service'
import type { GenerationConfig } from '../config/generation-config.schema'
import { AssetUploader } from './asset-uploader.service'
import { FallbackProvider } from './fallback-provider.service'
import { GenerationProgressService } from './generation-progress.service'
import { GenerationTask } from './generation-task'
import { AssetUploadError, ConfigurationError, ContentPolicyRejection, ResultAssemblyError } from './generation.errors'
import type {
  GenerationRequest,
  GenerationResult,
  PreparedRequest,
  ProgressEmitter,
  VendorAdapter,
  VendorContext,
} from './generation.types'
import { OUTPUT_KIND } from './generation.types'
import { formatBalance, formatSuccessInfo, FailureDescription } from './messages'
import { Poller } from './poller.service'
import { QuotaProber } from './quota-prober.service'
import { ResultCollector } from './result-collector.service'
import { TaskSubmitter } from './task-submitter.service'
import { VendorRegistry } from './vendor-registry.service'

interface Invocation {
  config: GenerationConfig
  adapter: VendorAdapter
  prepared: PreparedRequest
  ctx: VendorContext
  emit: ProgressEmitter
}

@Injectable()
export class GenerationOrchestrator {
  private readonly logger = new Logger(GenerationOrchestrator.name)

  constructor(
    private readonly configStore: ConfigStore,
    private readonly registry: VendorRegistry,
    private readonly uploader: AssetUploader,
    private readonly submitter: TaskSubmitter,
    private readonly poller: Poller,
    private readonly collector: ResultCollector,
    private readonly quota: QuotaProber,
    private readonly fallback: FallbackProvider,
    private readonly progress: GenerationProgressService,
    @Inject(HTTP_CLIENT) private readonly http: AxiosInstance,
  ) {}

  /**
   * Runs one generation end to end. Only ConfigurationError escapes; every
   * other failure comes back as a placeholder result with a diagnostic.
   */
  async generate(request: GenerationRequest): Promise<GenerationResult> {
    const invocation = this.prepare(request)
    const { adapter, config } = invocation
    this.logger.log('generation started', {
      vendor: adapter.name,
      kind: request.kind,
      model: invocation.prepared.model,
      refs: invocation.prepared.request.referenceAssets?.length ?? 0,
    })

    let task: GenerationTask | undefined
    let result: GenerationResult
    try {
      result = await this.run(invocation, (submitted) => {
        task = submitted
      })
    } catch (err: unknown) {
      if (err instanceof ConfigurationError) throw err
      result = this.fail(invocation, this.describe(err, task))
    }

    invocation.emit({ stage: 'done', taskId: result.taskId, usedFallback: result.usedFallback })
    this.logger.log('generation finished', {
      vendor: adapter.name,
      taskId: result.taskId,
      usedFallback: result.usedFallback,
      assets: result.assets.length,
      locale: config.locale,
    })
    return result
  }

  /** Resolves everything configuration-dependent before any network traffic. */
  private prepare(request: GenerationRequest): Invocation {
    const config = this.configStore.current
    const adapter = this.registry.resolve(request.vendor)
    const settings = this.configStore.requireVendor(adapter.name, adapter.defaultBaseUrl)
    const prepared = adapter.prepare(request, settings)
    const emit: ProgressEmitter = (event) =>
      this.progress.emit({
        ...event,
        channel: request.progressChannel,
        vendor: adapter.name,
        taskKind: request.kind,
      })
    return {
      config,
      adapter,
      prepared,
      ctx: { http: this.http, settings, timeoutMs: config.timeoutSeconds * 1000 },
      emit,
    }
  }

  private async run(invocation: Invocation, onSubmitted: (task: GenerationTask) => void): Promise<GenerationResult> {
    const { adapter, prepared, ctx, config, emit } = invocation

    const refs = await this.uploader.uploadAll(adapter, prepared, ctx, emit)

    emit({ stage: 'submit' })
    const submitted = await this.submitter.submit(adapter, prepared, refs, ctx)
    if (!submitted.ok) {
      return this.fail(invocation, {
        category: submitted.error instanceof ContentPolicyRejection ? 'content_policy' : 'submission',
        detail: submitted.error.message,
      })
    }
    const { task, pollParams } = submitted
    onSubmitted(task)
    emit({ stage: 'submit', taskId: task.id, status: task.status })

    const outcome = await this.poller.poll(
      adapter,
      task,
      pollParams,
      ctx,
      { maxWaitSeconds: config.maxWaitSeconds, intervalSeconds: config.pollIntervalSeconds },
      emit,
    )
    if (task.status !== 'succeeded') {
      return this.fail(invocation, {
        category: task.errorInfo?.category ?? 'failed',
        detail: task.errorInfo?.message ?? outcome.message,
        taskId: task.id,
      })
    }

    emit({ stage: 'collect', taskId: task.id, status: task.status })
    const collected = await this.collector.collect(task, outcome.assetUrls, {
      maxAssetsPerTask: config.maxAssetsPerTask,
      downloadTimeoutSeconds: config.downloadTimeoutSeconds,
    })
    const lines = [formatSuccessInfo(config.locale, prepared.request, prepared.model, task.id, collected.urls)]
    const quota = await this.quota.probe(adapter, ctx)
    if (quota?.ok) lines.push(formatBalance(config.locale, quota.balance))
    const infoText = lines.join('\n')

    return collected.outputKind === 'video'
      ? { outputKind: 'video', assets: collected.assets, infoText, usedFallback: false, taskId: task.id }
      : { outputKind: 'image', assets: collected.assets, infoText, usedFallback: false, taskId: task.id }
  }

  private fail(invocation: Invocation, failure: FailureDescription): GenerationResult {
    const { prepared, config } = invocation
    return this.fallback.build(OUTPUT_KIND[prepared.request.kind], failure, {
      locale: config.locale,
      placeholderSize: config.defaultPlaceholderSize,
    })
  }

  private describe(err: unknown, task?: GenerationTask): FailureDescription {
    if (err instanceof AssetUploadError) {
      return { category: 'upload', detail: err.message, index: err.index }
    }
    if (err instanceof ResultAssemblyError) {
      return { category: 'assembly', detail: err.message, taskId: task?.id }
    }
    this.logger.error('unexpected generation failure', err instanceof Error ? err.stack : errorMessage(err))
    return { category: 'failed', detail: errorMessage(err), taskId: task?.id }
  }
}

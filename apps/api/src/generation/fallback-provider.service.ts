import { Inject, Injectable, Logger } from '@nestjs/common'
import type { Locale } from '../config/generation-config.schema'
import { MEDIA_CODEC, MediaCodec } from '../media/media-codec'
import type { GenerationResult, OutputKind } from './generation.types'
import { describeFailure, FailureDescription } from './messages'

export interface FallbackOptions {
  locale: Locale
  placeholderSize: { width: number; height: number }
}

/** Builds the well-formed placeholder result returned for every non-configuration failure. */
@Injectable()
export class FallbackProvider {
  private readonly logger = new Logger(FallbackProvider.name)

  constructor(@Inject(MEDIA_CODEC) private readonly codec: MediaCodec) {}

  build(outputKind: OutputKind, failure: FailureDescription, options: FallbackOptions): GenerationResult {
    const infoText = describeFailure(options.locale, failure)
    this.logger.warn('returning placeholder result', {
      outputKind,
      category: failure.category,
      taskId: failure.taskId,
    })
    if (outputKind === 'video') {
      return { outputKind, assets: [this.codec.emptyVideo()], infoText, usedFallback: true, taskId: failure.taskId }
    }
    const { width, height } = options.placeholderSize
    return {
      outputKind,
      assets: [this.codec.blankImage(width, height)],
      infoText,
      usedFallback: true,
      taskId: failure.taskId,
    }
  }
}

import { Body, Controller, HttpCode, Post, Query, Sse } from '@nestjs/common'
import { ConfigStore } from '../config/config-store.service'
import { AppError } from '../common/exceptions/app-error'
import { GenerationRequestSchema, toGenerationRequest, toGenerationResponse } from './dto/generation-request.dto'
import { GenerationOrchestrator } from './generation-orchestrator.service'
import { GenerationProgressService } from './generation-progress.service'

@Controller('generations')
export class GenerationController {
  constructor(
    private readonly orchestrator: GenerationOrchestrator,
    private readonly progress: GenerationProgressService,
    private readonly config: ConfigStore,
  ) {}

  @Post()
  @HttpCode(200)
  async generate(@Body() body: unknown) {
    const parsed = GenerationRequestSchema.safeParse(body)
    if (!parsed.success) {
      throw new AppError('invalid generation request', {
        status: 400,
        code: 'invalid_request',
        details: parsed.error.issues,
      })
    }
    const result = await this.orchestrator.generate(toGenerationRequest(parsed.data))
    return toGenerationResponse(result)
  }

  @Post('config/reload')
  @HttpCode(200)
  reloadConfig() {
    const config = this.config.reload()
    return { ok: true, vendors: Object.keys(config.vendors) }
  }

  @Sse('stream')
  stream(@Query('channel') channel: string): ReturnType<GenerationProgressService['stream']> {
    if (!channel) {
      throw new AppError('channel is required', { status: 400, code: 'invalid_request' })
    }
    return this.progress.stream(channel)
  }
}

import { Module } from '@nestjs/common'
import { CLOCK, systemClock } from '../common/clock'
import { HTTP_CLIENT, createHttpClient } from '../common/http-client'
import { BufferMediaCodec, MEDIA_CODEC } from '../media/media-codec'
import { R2StorageService } from '../storage/r2.service'
import { AssetUploader } from './asset-uploader.service'
import { FallbackProvider } from './fallback-provider.service'
import { GenerationController } from './generation.controller'
import { GenerationOrchestrator } from './generation-orchestrator.service'
import { GenerationProgressService } from './generation-progress.service'
import { Poller } from './poller.service'
import { QuotaProber } from './quota-prober.service'
import { ResultCollector } from './result-collector.service'
import { TaskSubmitter } from './task-submitter.service'
import { VendorRegistry } from './vendor-registry.service'

@Module({
  controllers: [GenerationController],
  providers: [
    { provide: HTTP_CLIENT, useFactory: createHttpClient },
    { provide: CLOCK, useValue: systemClock },
    { provide: MEDIA_CODEC, useClass: BufferMediaCodec },
    R2StorageService,
    VendorRegistry,
    AssetUploader,
    TaskSubmitter,
    Poller,
    ResultCollector,
    QuotaProber,
    FallbackProvider,
    GenerationProgressService,
    GenerationOrchestrator,
  ],
  exports: [GenerationOrchestrator, GenerationProgressService],
})
export class GenerationModule {}

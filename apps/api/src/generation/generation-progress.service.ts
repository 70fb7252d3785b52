import { Injectable, Logger, MessageEvent } from '@nestjs/common'
import { Observable, Subject } from 'rxjs'
import { filter, map } from 'rxjs/operators'
import type { GenerationProgressEvent } from './generation.types'

@Injectable()
export class GenerationProgressService {
  private readonly logger = new Logger(GenerationProgressService.name)
  private readonly emitter = new Subject<GenerationProgressEvent>()

  emit(event: GenerationProgressEvent) {
    if (!event.channel) return
    const payload: GenerationProgressEvent = {
      ...event,
      timestamp: event.timestamp ?? Date.now(),
    }
    this.logger.debug('generation progress emit', {
      channel: payload.channel,
      stage: payload.stage,
      status: payload.status,
      progress: payload.progress,
    })
    this.emitter.next(payload)
  }

  events(channel: string): Observable<GenerationProgressEvent> {
    return this.emitter.asObservable().pipe(filter((event) => event.channel === channel))
  }

  stream(channel: string): Observable<MessageEvent> {
    return this.events(channel).pipe(map((event) => ({ data: event })))
  }
}

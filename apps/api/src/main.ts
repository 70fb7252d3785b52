import 'reflect-metadata'
import { Logger } from '@nestjs/common'
import { NestFactory } from '@nestjs/core'
import { json, urlencoded } from 'express'
import { AppModule } from './app.module'
import { HttpExceptionFilter } from './common/exceptions/http-exception.filter'

async function bootstrap() {
  const app = await NestFactory.create(AppModule)
  // reference assets arrive base64-encoded in the JSON body
  app.use(json({ limit: '50mb' }))
  app.use(urlencoded({ limit: '50mb', extended: true }))

  app.useGlobalFilters(new HttpExceptionFilter())

  app.enableCors({
    origin: true,
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Accept'],
  })
  const port = process.env.PORT ?? 3000
  await app.listen(port)
  new Logger('Bootstrap').log(`generation api listening on ${port}`)
}

bootstrap().catch((err: unknown) => {
  new Logger('Bootstrap').error('failed to start', err instanceof Error ? err.stack : String(err))
  process.exitCode = 1
})

import { ArgumentsHost, Catch, ExceptionFilter, HttpException, Logger } from '@nestjs/common'
import type { Response } from 'express'
import { isAppErrorLike, isRecord } from './app-error'

function normalizeHttpStatus(value: unknown, fallback: number): number {
  const n = typeof value === 'number' ? value : Number(value)
  if (!Number.isFinite(n)) return fallback
  const status = Math.trunc(n)
  if (status < 400 || status > 599) return fallback
  return status
}

@Catch()
export class HttpExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(HttpExceptionFilter.name)

  catch(exception: unknown, host: ArgumentsHost) {
    const res = host.switchToHttp().getResponse<Response>()

    if (exception instanceof HttpException) {
      const body = exception.getResponse()
      const message =
        isRecord(body) && typeof body.message === 'string' ? body.message : exception.message
      res.status(exception.getStatus()).json({
        // 兼容前端：同时提供 message 和 error 字段
        message,
        error: message,
        code: 'http_error',
        details: isRecord(body) ? body : undefined,
      })
      return
    }

    if (isAppErrorLike(exception)) {
      const status = normalizeHttpStatus(exception.status, 400)
      const code =
        typeof exception.code === 'string' && exception.code.trim() ? exception.code : 'bad_request'
      const message =
        typeof exception.message === 'string' && exception.message.trim()
          ? exception.message
          : 'Bad Request'
      res.status(status).json({ message, error: message, code, details: exception.details })
      return
    }

    const err = exception instanceof Error ? exception : null
    this.logger.error('Unhandled error', err?.stack)
    res.status(500).json({
      message: err?.message || 'Internal Server Error',
      error: 'Internal Server Error',
      code: 'internal_error',
      details: { name: err?.name },
    })
  }
}

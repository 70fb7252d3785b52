export class AppError extends Error {
  status: number
  code: string
  details?: unknown

  constructor(message: string, options?: { status?: number; code?: string; details?: unknown }) {
    super(message)
    this.name = 'AppError'
    this.status = options?.status ?? 400
    this.code = options?.code ?? 'bad_request'
    this.details = options?.details
  }
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return !!value && typeof value === 'object'
}

export function isAppErrorLike(err: unknown): err is {
  name?: unknown
  message?: unknown
  status?: unknown
  code?: unknown
  details?: unknown
} {
  if (!isRecord(err)) return false
  return err.name === 'AppError' || (typeof err.status === 'number' && typeof err.code === 'string')
}

export function errorMessage(err: unknown, fallback = 'unknown error'): string {
  if (err instanceof Error && err.message.trim()) return err.message
  if (typeof err === 'string' && err.trim()) return err
  return fallback
}

import { AppError } from '../common/exceptions/app-error'

/**
 * Missing or invalid credentials, vendor sections or model entries.
 * The only failure allowed to abort an invocation; it is raised before any network call.
 */
export class ConfigurationError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, { status: 400, code: 'configuration_error', details })
    this.name = 'ConfigurationError'
  }
}

export class ContentPolicyRejection extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, { status: 422, code: 'content_policy_rejected', details })
    this.name = 'ContentPolicyRejection'
  }
}

export class SubmissionError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, { status: 502, code: 'submission_error', details })
    this.name = 'SubmissionError'
  }
}

export class AssetUploadError extends AppError {
  readonly index: number

  constructor(index: number, message: string, details?: unknown) {
    super(message, { status: 502, code: 'asset_upload_error', details })
    this.name = 'AssetUploadError'
    this.index = index
  }
}

export class ResultAssemblyError extends AppError {
  readonly index?: number

  constructor(message: string, index?: number, details?: unknown) {
    super(message, { status: 502, code: 'result_assembly_error', details })
    this.name = 'ResultAssemblyError'
    this.index = index
  }
}

export class QuotaProbeError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, { status: 502, code: 'quota_probe_error', details })
    this.name = 'QuotaProbeError'
  }
}

export class TaskStateError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'TaskStateError'
  }
}

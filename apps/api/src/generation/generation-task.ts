import { TaskStateError } from './generation.errors'
import type { OutputKind, TaskAsset, TaskErrorInfo, TaskStatus } from './generation.types'

const TERMINAL: ReadonlySet<TaskStatus> = new Set<TaskStatus>(['succeeded', 'failed', 'cancelled', 'timed_out'])

export function isTerminal(status: TaskStatus): boolean {
  return TERMINAL.has(status)
}

/**
 * One submitted remote job, owned by a single invocation and dropped once its
 * result is built. Status only moves forward: submitted → running → terminal.
 */
export class GenerationTask {
  private _status: TaskStatus = 'submitted'
  private _assets: TaskAsset[] = []
  private _errorInfo?: TaskErrorInfo

  constructor(
    readonly id: string,
    readonly outputKind: OutputKind,
    readonly submittedAt: number,
  ) {}

  get status(): TaskStatus {
    return this._status
  }

  get assets(): readonly TaskAsset[] {
    return this._assets
  }

  get errorInfo(): TaskErrorInfo | undefined {
    return this._errorInfo
  }

  get terminal(): boolean {
    return isTerminal(this._status)
  }

  transition(next: TaskStatus, errorInfo?: TaskErrorInfo): void {
    if (next === this._status && !this.terminal) return
    if (this.terminal) {
      throw new TaskStateError(`task ${this.id} is already ${this._status}, cannot move to ${next}`)
    }
    if (next === 'submitted') {
      throw new TaskStateError(`task ${this.id} cannot return to submitted from ${this._status}`)
    }
    this._status = next
    if (errorInfo) this._errorInfo = errorInfo
  }

  attachAssets(assets: TaskAsset[]): void {
    if (this._status !== 'succeeded') {
      throw new TaskStateError(`task ${this.id} is ${this._status}; assets attach only after success`)
    }
    this._assets = [...assets].sort((a, b) => a.index - b.index)
  }
}

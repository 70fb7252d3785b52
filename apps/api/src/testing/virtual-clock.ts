import type { Clock } from '../common/clock'

/** Clock whose sleep advances time instantly; lets poll loops run without waiting. */
export class VirtualClock implements Clock {
  readonly sleeps: number[] = []

  constructor(private current = 0) {}

  now(): number {
    return this.current
  }

  async sleep(ms: number): Promise<void> {
    this.sleeps.push(ms)
    this.current += ms
  }

  advance(ms: number): void {
    this.current += ms
  }
}

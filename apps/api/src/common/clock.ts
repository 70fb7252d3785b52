export interface Clock {
  now(): number
  sleep(ms: number): Promise<void>
}

export const CLOCK = Symbol('CLOCK')

const wait = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms))

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: wait,
}

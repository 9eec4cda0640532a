// src/utils/timeout.ts
import { SourceTimeoutError } from '../errors'

// run a task that honours an AbortSignal; reject with SourceTimeoutError after ms and abort the task
export function withTimeout<T>(task: (signal: AbortSignal) => Promise<T>, ms: number, label = 'source call'): Promise<T> {
  const controller = new AbortController()
  return new Promise<T>((resolve, reject) => {
    let done = false
    const timer = setTimeout(() => {
      if (!done) {
        done = true
        controller.abort()
        reject(new SourceTimeoutError(`${label} timed out after ${ms}ms`))
      }
    }, ms)

    task(controller.signal).then(
      (v) => {
        if (!done) {
          done = true
          clearTimeout(timer)
          resolve(v)
        }
      },
      (e: unknown) => {
        if (!done) {
          done = true
          clearTimeout(timer)
          reject(e)
        }
      }
    )
  })
}

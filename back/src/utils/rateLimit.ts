import { AppError, ErrorCodes } from './errors.js'

export { createFixedWindowRateLimiter }
export type { RateLimiter, RateLimitConfig }

type RateLimitConfig = {
  maxRequests: number
  windowMs: number
}

type RateLimiter = {
  // Throws RATE_LIMITED once `key` has used up its window.
  check: (key: string) => void
  size: () => number
}

type Window = { count: number; startedAt: number }

// Job ids are unbounded; expired windows are swept once per window length.
const createFixedWindowRateLimiter = (
  config: RateLimitConfig,
  now: () => number = Date.now
): RateLimiter => {
  const windows = new Map<string, Window>()
  let lastSweep = now()

  const sweep = (at: number) => {
    if (at - lastSweep < config.windowMs) return
    for (const [key, window] of windows) {
      if (at - window.startedAt >= config.windowMs) {
        windows.delete(key)
      }
    }
    lastSweep = at
  }

  return {
    check: (key) => {
      const at = now()
      sweep(at)

      const window = windows.get(key)
      if (!window || at - window.startedAt >= config.windowMs) {
        windows.set(key, { count: 1, startedAt: at })
        return
      }
      if (window.count >= config.maxRequests) {
        throw new AppError(ErrorCodes.RATE_LIMITED, 'too many requests', 429, {
          key,
          retryAfterMs: config.windowMs - (at - window.startedAt)
        })
      }
      window.count += 1
    },
    size: () => windows.size
  }
}

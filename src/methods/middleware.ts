import { Request, Response, NextFunction, RequestHandler } from 'express'
import { AppContext } from '../config'
import { logError } from '../logger'
import { UserRecord } from '../store'

declare global {
  namespace Express {
    interface Request {
      user?: UserRecord
    }
  }
}

// ============================================
// RATE LIMITING
// ============================================

const rateLimitStore = new Map<string, { count: number; resetAt: number }>()
const RATE_LIMIT_WINDOW = 60 * 1000 // 1 minute
const RATE_LIMIT_MAX_REQUESTS = 200 // 200 requests per minute

function rateLimit(identifier: string): boolean {
  const nowMs = Date.now()
  const record = rateLimitStore.get(identifier)

  if (!record || record.resetAt < nowMs) {
    rateLimitStore.set(identifier, { count: 1, resetAt: nowMs + RATE_LIMIT_WINDOW })
    return true
  }

  if (record.count >= RATE_LIMIT_MAX_REQUESTS) {
    return false
  }

  record.count++
  return true
}

// Clean up old rate limit entries periodically
setInterval(() => {
  const nowMs = Date.now()
  for (const [key, value] of rateLimitStore.entries()) {
    if (value.resetAt < nowMs) {
      rateLimitStore.delete(key)
    }
  }
}, RATE_LIMIT_WINDOW).unref()

export function rateLimitMiddleware(req: Request, res: Response, next: NextFunction) {
  const identifier = req.ip || 'unknown'
  if (!rateLimit(identifier)) {
    res.status(429).json({ error: 'Too many requests. Please try again later.' })
    return
  }
  next()
}

// ============================================
// AUTH
// ============================================

/**
 * Trusts the X-User-Id header set by the fronting auth layer; the user must
 * exist in the store.
 */
export function authMiddleware(ctx: AppContext): RequestHandler {
  return async (req, res, next) => {
    const userId = req.headers['x-user-id']
    if (typeof userId !== 'string' || !userId) {
      res.status(401).json({ error: 'Missing or invalid X-User-Id header' })
      return
    }

    try {
      const user = await ctx.store.getUser(userId)
      if (!user) {
        res.status(401).json({ error: 'Unknown user' })
        return
      }
      req.user = user
      next()
    } catch (error) {
      logError('[Auth] User lookup failed', error)
      res.status(500).json({ error: 'Internal server error' })
    }
  }
}

export function currentUser(req: Request): UserRecord {
  if (!req.user) throw new Error('authMiddleware has not run for this route')
  return req.user
}

export function queryString(value: unknown): string | undefined {
  return typeof value === 'string' && value ? value : undefined
}

export function queryLimit(value: unknown, fallback: number, max: number): number {
  const parsed = parseInt(queryString(value) ?? '', 10)
  return Math.min(parsed > 0 ? parsed : fallback, max)
}

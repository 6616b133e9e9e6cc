/**
 * Sentry Monitoring Configuration
 *
 * Error tracking for the HTTP routes and the realtime handlers.
 *
 * Setup:
 * 1. Set SENTRY_DSN in production
 * 2. Optionally set SENTRY_ENVIRONMENT (defaults to 'development')
 * 3. Call initSentry() before starting the server
 */

import * as Sentry from '@sentry/node'
import type { SeverityLevel } from '@sentry/node'
import { Request, Response, NextFunction } from 'express'
import { log } from './logger'

let isInitialized = false

/**
 * Initialize Sentry for error tracking
 */
export function initSentry(): void {
  const dsn = process.env.SENTRY_DSN

  if (!dsn) {
    log('Sentry DSN not configured - error tracking disabled')
    return
  }

  Sentry.init({
    dsn,
    environment: process.env.SENTRY_ENVIRONMENT || 'development',
    release: process.env.npm_package_version || '1.0.0',

    // Performance monitoring
    tracesSampleRate: process.env.NODE_ENV === 'production' ? 0.1 : 1.0,

    beforeSend(event) {
      // Rate limit rejections are expected traffic, not errors
      if (event.exception?.values?.[0]?.value?.includes('Too many requests')) {
        return null
      }
      return event
    },
  })

  isInitialized = true
  log('Sentry initialized for error tracking')
}

/**
 * Express error middleware: reports, then hands the error on
 */
export function sentryErrorHandler() {
  return (err: Error, _req: Request, _res: Response, next: NextFunction) => {
    if (isInitialized) {
      Sentry.captureException(err)
    }
    next(err)
  }
}

/**
 * Capture an error with context
 */
export function captureError(
  error: Error | string,
  context?: {
    tags?: Record<string, string>
    extra?: Record<string, unknown>
    user?: { id: string; username?: string }
    level?: SeverityLevel
  }
): void {
  if (!isInitialized) {
    log(`Error (not sent to Sentry): ${error}`)
    return
  }

  Sentry.withScope((scope) => {
    if (context?.tags) {
      Object.entries(context.tags).forEach(([key, value]) => {
        scope.setTag(key, value)
      })
    }

    if (context?.extra) {
      scope.setExtras(context.extra)
    }

    if (context?.user) {
      scope.setUser(context.user)
    }

    if (context?.level) {
      scope.setLevel(context.level)
    }

    if (typeof error === 'string') {
      Sentry.captureMessage(error, context?.level || 'error')
    } else {
      Sentry.captureException(error)
    }
  })
}

export function toReportable(error: unknown): Error | string {
  return error instanceof Error ? error : String(error)
}

/**
 * Capture an error raised while handling a realtime frame or connection
 */
export function captureRealtimeError(
  error: Error | string,
  context: {
    operation:
      | 'chat_message'
      | 'read_receipt'
      | 'delivery_receipt'
      | 'delete_message'
      | 'reaction'
      | 'open_chat'
      | 'presence'
      | 'connect'
      | 'call'
      | 'other'
    userId?: string
    chatId?: string
    callId?: string
    messageId?: string
    extra?: Record<string, unknown>
  }
): void {
  captureError(error, {
    tags: {
      module: 'realtime',
      operation: context.operation,
    },
    extra: {
      chatId: context.chatId,
      callId: context.callId,
      messageId: context.messageId,
      ...context.extra,
    },
    user: context.userId ? { id: context.userId } : undefined,
  })
}

/**
 * Add breadcrumb for debugging
 */
export function addBreadcrumb(
  message: string,
  category: string,
  data?: Record<string, unknown>
): void {
  if (!isInitialized) return
  Sentry.addBreadcrumb({
    message,
    category,
    data,
    level: 'info',
  })
}

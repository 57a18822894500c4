import { Request, Response, NextFunction } from 'express'
import type { Logger } from '../lib/logger'

const SENSITIVE_FIELDS = ['password', 'token', 'secret', 'key']

const METHOD_TO_ACTION: Record<string, string> = {
  GET: 'view',
  POST: 'create',
  PUT: 'update',
  PATCH: 'update',
  DELETE: 'delete'
}

/**
 * Middleware to log API requests once the response has been sent
 */
export const requestLogger = (logger: Logger, options: { logRequestBody?: boolean } = {}) => {
  const { logRequestBody = false } = options

  return (req: Request, res: Response, next: NextFunction) => {
    const startTime = Date.now()

    res.on('finish', () => {
      const { resource, action, resourceId } = extractResourceInfo(req)

      const entry = {
        action,
        resource,
        resourceId,
        method: req.method,
        url: req.originalUrl,
        statusCode: res.statusCode,
        duration: Date.now() - startTime,
        userAgent: req.get('User-Agent'),
        ipAddress: req.ip,
        ...(logRequestBody && isRecord(req.body) && Object.keys(req.body).length > 0 && {
          requestBody: sanitizeRequestBody(req.body)
        })
      }

      if (res.statusCode >= 500) {
        logger.error('API request failed', entry)
      } else if (res.statusCode >= 400) {
        logger.warn('API request rejected', entry)
      } else {
        logger.info('API request', entry)
      }
    })

    next()
  }
}

/**
 * Resource, action and id from a path such as /api/invoices/12/pdf
 */
export function extractResourceInfo(req: Pick<Request, 'method' | 'originalUrl'>): {
  resource: string
  action: string
  resourceId?: string
} {
  const pathParts = req.originalUrl.split('?')[0].split('/').filter(Boolean)
  const action = METHOD_TO_ACTION[req.method] || 'access'

  let resource = 'unknown'
  let resourceId: string | undefined

  const apiIndex = pathParts.indexOf('api')
  if (apiIndex !== -1 && apiIndex < pathParts.length - 1) {
    resource = pathParts[apiIndex + 1]

    const nextPart = pathParts[apiIndex + 2]
    if (nextPart && /^\d+$/.test(nextPart)) {
      resourceId = nextPart
    }
  }

  if (resourceId && pathParts[apiIndex + 3] === 'pdf') {
    return { resource, action: 'export', resourceId }
  }

  return { resource, action, resourceId }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

export function sanitizeRequestBody(body: Record<string, unknown>): Record<string, unknown> {
  const sanitized = { ...body }

  for (const field of Object.keys(sanitized)) {
    if (SENSITIVE_FIELDS.some(sensitive => field.toLowerCase().includes(sensitive))) {
      sanitized[field] = '[REDACTED]'
    }
  }

  return sanitized
}

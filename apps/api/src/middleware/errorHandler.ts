import { Request, Response, NextFunction } from 'express'
import { MulterError } from 'multer'
import { ZodError } from 'zod'
import { AppError } from '../lib/errors'
import type { Logger } from '../lib/logger'

export const notFoundHandler = (req: Request, res: Response) => {
  res.status(404).json({ error: 'Route not found' })
}

export const errorHandler = (logger: Logger) => (
  err: Error,
  req: Request,
  res: Response,
  _next: NextFunction
) => {
  if (err instanceof AppError) {
    return res.status(err.statusCode).json({
      error: err.message,
      ...(err.details !== undefined && { details: err.details })
    })
  }

  if (err instanceof ZodError) {
    return res.status(400).json({
      error: 'Invalid request',
      details: err.issues.map(issue => ({ path: issue.path.join('.'), message: issue.message }))
    })
  }

  if (err instanceof MulterError) {
    return res.status(400).json({ error: err.message })
  }

  if (err instanceof SyntaxError && 'body' in err) {
    return res.status(400).json({ error: 'Malformed JSON body' })
  }

  logger.error('Unhandled error', { error: err.message, stack: err.stack, url: req.originalUrl })
  res.status(500).json({ error: 'Something went wrong!' })
}

import { NotFoundError } from './errors'

/**
 * Numeric id from a route parameter; anything else can't name a record
 */
export function parseIdParam(value: string, resource: string): number {
  const id = Number(value)
  if (!/^\d+$/.test(value) || !Number.isSafeInteger(id) || id < 1) {
    throw new NotFoundError(resource, value)
  }
  return id
}

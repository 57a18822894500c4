import { Knex } from 'knex'
import type { Page } from '@waybill/shared'

export interface PageRequest {
  page: number
  perPage: number
}

/**
 * `%term%` for a case-insensitive LIKE, with wildcards in the term escaped.
 * Pair with {@link LIKE_ESCAPE}.
 */
export function likePattern(term: string): string {
  return `%${term.toLowerCase().replace(/[\\%_]/g, (char) => `\\${char}`)}%`
}

export const LIKE_ESCAPE = "escape '\\'"

export async function countRows(query: Knex.QueryBuilder): Promise<number> {
  const rows = await query.clone().clearSelect().clearOrder().count({ count: '*' })
  return Number(rows[0]?.count ?? 0)
}

export function toPage<T>(data: T[], total: number, request: PageRequest): Page<T> {
  return {
    data,
    total,
    page: request.page,
    perPage: request.perPage,
    totalPages: Math.max(1, Math.ceil(total / request.perPage)),
  }
}

export function pageOffset(request: PageRequest): number {
  return (request.page - 1) * request.perPage
}

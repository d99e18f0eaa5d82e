import { z } from 'zod'
import apiClient, { ApiRequestError } from './client'
import { logger } from '@/lib/logger'
import { parseCapacitySnapshots, parsePipelines, parseTickets } from '@/lib/records'
import type { CapacitySnapshot, PipelineRecord, TicketRecord } from '@/types'

const log = logger.child('api')

const rowsResponseSchema = z.object({
  rows: z.array(z.unknown()),
})

async function getRows(url: string): Promise<unknown[]> {
  const body = await apiClient.get<unknown>(url)
  const parsed = rowsResponseSchema.safeParse(body)
  if (!parsed.success) {
    log.warn(`${url} returned no rows array`, {
      issues: parsed.error.issues.map((issue) => `${issue.path.join('.') || 'body'}: ${issue.message}`),
    })
    throw new ApiRequestError('Malformed response', 502, 'INVALID_RESPONSE')
  }
  return parsed.data.rows
}

export const api = {
  // Tickets
  getTickets: async (now: Date = new Date()): Promise<TicketRecord[]> =>
    parseTickets(await getRows('/v1/tickets'), now),

  // Pipelines
  getPipelines: async (): Promise<PipelineRecord[]> => parsePipelines(await getRows('/v1/pipelines')),

  // Capacity
  getCapacitySnapshots: async (): Promise<CapacitySnapshot[]> =>
    parseCapacitySnapshots(await getRows('/v1/capacity')),
}

export { apiClient, ApiRequestError } from './client'
export default api

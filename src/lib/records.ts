import { z } from 'zod'
import { logger as rootLogger } from '@/lib/logger'
import type { PlatformId } from '@/types/platforms'
import type {
  CapacitySnapshot,
  PipelineRecord,
  PipelineStatus,
  TicketPriority,
  TicketRecord,
  TicketStatus,
} from '@/types/records'

const logger = rootLogger.child('records')

const DAY_MS = 24 * 60 * 60 * 1000
const MAX_TITLE_LENGTH = 80

const PLATFORM_ALIASES: Record<string, PlatformId> = {
  datalake: 'datalake',
  data_lake: 'datalake',
  'data lake': 'datalake',
  warehouse: 'warehouse',
  analytics: 'analytics',
  workflows: 'workflows',
}

export function parsePlatformId(value: string): PlatformId | null {
  const normalized = value.trim().toLowerCase()
  return Object.hasOwn(PLATFORM_ALIASES, normalized) ? PLATFORM_ALIASES[normalized] : null
}

const platformField = z.string().transform((value, ctx) => {
  const platform = parsePlatformId(value)
  if (!platform) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Unknown platform: ${value}` })
    return z.NEVER
  }
  return platform
})

const flag = (fallback: boolean) =>
  z
    .union([z.boolean(), z.string()])
    .optional()
    .transform((value) => {
      if (value === undefined) return fallback
      if (typeof value === 'boolean') return value
      return value.trim().toLowerCase() === 'true'
    })

const measure = z.coerce.number().finite().nonnegative().default(0)

const TICKET_STATUSES: readonly TicketStatus[] = ['Open', 'In Progress', 'Pending', 'Resolved', 'Closed']

export function priorityFromType(type: string): TicketPriority {
  const prefix = type.trim().toUpperCase()
  if (prefix.startsWith('INC')) return 'High'
  if (prefix.startsWith('PRB')) return 'Medium'
  return 'Low'
}

export function resolvePipelineStatus(status: string, originalStatus = ''): PipelineStatus {
  const current = status.toLowerCase()
  const original = originalStatus.toLowerCase()

  if (current.includes('failed') || original === 'r' || original.includes('failed')) return 'failed'
  if (current.includes('delayed')) return 'delayed'
  if (current.includes('not applicable')) return 'not_applicable'
  if (current.includes('running')) return 'running'
  if (current.includes('pending') || current.includes('scheduled')) return 'pending'
  // Anything unrecognised counts as a successful run.
  return 'successful'
}

const ticketRowSchema = z.object({
  id: z.string().min(1),
  platform: platformField,
  title: z.string().default(''),
  type: z.string().default('REQ'),
  state: z.string().default('Open'),
  assignmentGroup: z
    .string()
    .default('')
    .transform((value) => value || 'Unassigned'),
  createdAt: z.string().default(''),
  isActive: flag(true),
  isBreached: flag(false),
})

const pipelineRowSchema = z.object({
  pipelineId: z.string().min(1),
  platform: platformField,
  status: z.string().default(''),
  originalStatus: z.string().default(''),
  delaySeconds: z
    .union([z.number(), z.string(), z.null()])
    .optional()
    .transform((value) => {
      const parsed = typeof value === 'number' ? value : Number(value ?? 0)
      return Number.isFinite(parsed) ? parsed : 0
    }),
})

const capacityRowSchema = z.object({
  snapshotTs: z.string().min(1),
  storageUsageTb: measure,
  storageCapacityTb: measure,
  memoryUsageTb: measure,
  memoryCapacityTb: measure,
})

/**
 * Validates each row on its own. Rows that fail are logged and dropped so
 * the remaining records still reach the engine.
 */
export function parseRows<T>(rows: readonly unknown[], parse: (row: unknown) => T | null, source: string): T[] {
  const parsed: T[] = []
  rows.forEach((row, index) => {
    const record = parse(row)
    if (record === null) {
      logger.warn(`Skipping malformed ${source} row`, { index })
      return
    }
    parsed.push(record)
  })

  if (rows.length > 0 && parsed.length === 0) {
    logger.warn(`No valid ${source} records parsed`, { rows: rows.length })
  } else if (parsed.length > 0) {
    logger.debug(`Parsed ${source} records`, { rows: rows.length, records: parsed.length })
  }
  return parsed
}

export function parseTicketRow(row: unknown, now: Date = new Date()): TicketRecord | null {
  const result = ticketRowSchema.safeParse(row)
  if (!result.success) return null
  const data = result.data

  const created = data.createdAt ? new Date(data.createdAt) : null
  const ageDays =
    created && !Number.isNaN(created.getTime())
      ? Math.max(0, Math.floor((now.getTime() - created.getTime()) / DAY_MS))
      : 0

  const title =
    data.title.length > MAX_TITLE_LENGTH ? `${data.title.slice(0, MAX_TITLE_LENGTH - 3)}...` : data.title
  const status = TICKET_STATUSES.find((s) => s === data.state) ?? 'Open'

  return {
    id: data.id,
    platform: data.platform,
    title,
    // Breached tickets are always escalated.
    priority: data.isBreached ? 'High' : priorityFromType(data.type),
    status,
    owner: data.assignmentGroup,
    createdDate: data.createdAt.slice(0, 10),
    ageDays,
    isActive: data.isActive,
    isBreached: data.isBreached,
  }
}

export function parsePipelineRow(row: unknown): PipelineRecord | null {
  const result = pipelineRowSchema.safeParse(row)
  if (!result.success) return null
  const data = result.data
  const status = resolvePipelineStatus(data.status, data.originalStatus)
  return {
    platform: data.platform,
    pipelineId: data.pipelineId,
    // Data lake runs that succeeded late are reported as delayed.
    status: data.platform === 'datalake' && status === 'successful' && data.delaySeconds > 0 ? 'delayed' : status,
    delaySeconds: data.delaySeconds,
  }
}

export function parseCapacityRow(row: unknown): CapacitySnapshot | null {
  const result = capacityRowSchema.safeParse(row)
  return result.success ? result.data : null
}

export const parseTickets = (rows: readonly unknown[], now: Date = new Date()): TicketRecord[] =>
  parseRows(rows, (row) => parseTicketRow(row, now), 'ticket')

export const parsePipelines = (rows: readonly unknown[]): PipelineRecord[] =>
  parseRows(rows, parsePipelineRow, 'pipeline')

export const parseCapacitySnapshots = (rows: readonly unknown[]): CapacitySnapshot[] =>
  parseRows(rows, parseCapacityRow, 'capacity')

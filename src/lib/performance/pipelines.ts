import { createRandomSource } from '@/lib/random'
import type { PipelineSummary } from '@/types/performance'
import type { PlatformId } from '@/types/platforms'
import type { PipelineRecord } from '@/types/records'

interface SummaryFallback {
  seed: number
  total: number
}

const FALLBACKS: Partial<Record<PlatformId, SummaryFallback>> = {
  datalake: { seed: 42, total: 245 },
  warehouse: { seed: 43, total: 150 },
}

const DEFAULT_FALLBACK: SummaryFallback = { seed: 43, total: 150 }

/** Counts a platform's pipelines by status. Running and pending runs are not counted. */
export function summarizePipelines(records: readonly PipelineRecord[], platform: PlatformId): PipelineSummary {
  const summary = { successful: 0, delayed: 0, failed: 0, not_applicable: 0 }
  for (const record of records) {
    if (record.platform !== platform) continue
    switch (record.status) {
      case 'successful':
      case 'delayed':
      case 'failed':
      case 'not_applicable':
        summary[record.status] += 1
        break
      default:
        break
    }
  }
  return {
    ...summary,
    total: summary.successful + summary.delayed + summary.failed + summary.not_applicable,
  }
}

/** Like `summarizePipelines`, but simulates a plausible summary when the platform has no rows. */
export function getPipelineSummary(
  records: readonly PipelineRecord[],
  platform: PlatformId = 'datalake'
): PipelineSummary {
  const summary = summarizePipelines(records, platform)
  if (summary.total > 0) return summary

  const { seed, total } = FALLBACKS[platform] ?? DEFAULT_FALLBACK
  const random = createRandomSource(seed)
  const failed = random.int(1, 5)
  const delayed = random.int(3, 10)
  return { successful: total - failed - delayed, delayed, failed, not_applicable: 0, total }
}

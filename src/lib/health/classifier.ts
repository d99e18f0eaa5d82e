import { STATUS_RULES } from '@/config/settings'
import { classifyStatus, describeRule } from './rules'
import type {
  PlatformHealth,
  PlatformId,
  PlatformInputs,
  PlatformRules,
  PlatformStatus,
  StatusSummary,
} from '@/types/platforms'

/** Substituted when a collaborator could not supply a current value. */
export const FALLBACK_INPUTS = Object.freeze({
  pipelineFailures: 2,
  pipelineDelays: 8,
  memoryTb: 18.2,
  storageTb: 54.7,
  memoryCapacityTb: 24.0,
  openTickets: 0,
})

const STATUS_LABELS: Record<PlatformStatus, string> = {
  healthy: 'Healthy',
  attention: 'Attention',
  critical: 'Critical',
}

const finiteOr = (value: number | undefined, fallback: number): number =>
  value !== undefined && Number.isFinite(value) ? value : fallback

const ticketsFor = (inputs: PlatformInputs, id: PlatformId): number =>
  finiteOr(inputs.ticketCounts?.[id], FALLBACK_INPUTS.openTickets)

export function evaluateDataLake(inputs: PlatformInputs, rules: PlatformRules = STATUS_RULES): PlatformHealth {
  const failures = finiteOr(inputs.pipelineFailures, FALLBACK_INPUTS.pipelineFailures)
  const delays = finiteOr(inputs.pipelineDelays, FALLBACK_INPUTS.pipelineDelays)
  const status = classifyStatus(failures, rules.datalake.pipelineFailures)

  return {
    id: 'datalake',
    name: 'Data Lake',
    subtitle: 'Enterprise Data Lake',
    status,
    statusLabel: STATUS_LABELS[status],
    metrics: {
      primary: {
        label: 'Pipeline Failures',
        value: String(failures),
        threshold: describeRule(rules.datalake.pipelineFailures),
      },
      secondary: { label: 'Data Delays', value: String(delays), threshold: '< 15' },
      tertiary: { label: 'Open Tickets', value: String(ticketsFor(inputs, 'datalake')) },
    },
    trend: 'stable',
  }
}

export function evaluateWarehouse(inputs: PlatformInputs, rules: PlatformRules = STATUS_RULES): PlatformHealth {
  const memory = finiteOr(inputs.memoryTb, FALLBACK_INPUTS.memoryTb)
  const storage = finiteOr(inputs.storageTb, FALLBACK_INPUTS.storageTb)
  const capacity = finiteOr(inputs.memoryCapacityTb, FALLBACK_INPUTS.memoryCapacityTb)
  const rule = rules.warehouse.memoryTb
  const status = classifyStatus(memory, rule)

  return {
    id: 'warehouse',
    name: 'Warehouse',
    subtitle: 'Business Warehouse',
    status,
    statusLabel: STATUS_LABELS[status],
    metrics: {
      primary: {
        label: 'Memory Usage',
        value: `${memory.toFixed(1)} TB`,
        threshold: `< ${capacity.toFixed(0)} TB`,
      },
      secondary: { label: 'Storage', value: `${storage.toFixed(1)} TB`, threshold: '< 60 TB' },
      tertiary: { label: 'Open Tickets', value: String(ticketsFor(inputs, 'warehouse')) },
    },
    // Display only; the status ladder above is the source of truth.
    trend: memory >= rule.healthy ? 'rising' : 'stable',
  }
}

export function evaluateAnalytics(inputs: PlatformInputs, rules: PlatformRules = STATUS_RULES): PlatformHealth {
  const tickets = ticketsFor(inputs, 'analytics')
  const status = classifyStatus(tickets, rules.analytics.openTickets)

  return {
    id: 'analytics',
    name: 'Analytics',
    subtitle: 'Analytics & Reporting',
    status,
    statusLabel: STATUS_LABELS[status],
    metrics: {
      primary: { label: 'Avg Load Time', value: '4.2s', threshold: '< 5s' },
      secondary: { label: 'CPU Peak', value: '72%', threshold: '< 80%' },
      tertiary: {
        label: 'Open Tickets',
        value: String(tickets),
        threshold: describeRule(rules.analytics.openTickets),
      },
    },
    trend: 'stable',
  }
}

export function evaluateWorkflows(inputs: PlatformInputs, rules: PlatformRules = STATUS_RULES): PlatformHealth {
  const tickets = ticketsFor(inputs, 'workflows')
  const status = classifyStatus(tickets, rules.workflows.openTickets)

  return {
    id: 'workflows',
    name: 'Workflows',
    subtitle: 'Self-Service Analytics',
    status,
    statusLabel: STATUS_LABELS[status],
    metrics: {
      primary: { label: 'Job Failures', value: '1', threshold: '< 5' },
      secondary: { label: 'Queue Depth', value: '3', threshold: '< 10' },
      tertiary: {
        label: 'Open Tickets',
        value: String(tickets),
        threshold: describeRule(rules.workflows.openTickets),
      },
    },
    trend: 'stable',
  }
}

export function evaluatePlatforms(inputs: PlatformInputs = {}, rules: PlatformRules = STATUS_RULES): PlatformHealth[] {
  return [
    evaluateDataLake(inputs, rules),
    evaluateWarehouse(inputs, rules),
    evaluateAnalytics(inputs, rules),
    evaluateWorkflows(inputs, rules),
  ]
}

export function summarizeStatuses(platforms: readonly PlatformHealth[], totalTickets: number): StatusSummary {
  return {
    healthy: platforms.filter((p) => p.status === 'healthy').length,
    attention: platforms.filter((p) => p.status === 'attention').length,
    critical: platforms.filter((p) => p.status === 'critical').length,
    totalTickets,
  }
}

import type { PlatformStatus, StatusRule, ThreeTierRule, TwoTierRule } from '@/types/platforms'

export const threeTier = (healthy: number, attention: number): ThreeTierRule => ({
  kind: 'three-tier',
  healthy,
  attention,
})

export const twoTier = (limit: number): TwoTierRule => ({ kind: 'two-tier', limit })

/**
 * Three-tier: below `healthy` is healthy, below `attention` needs attention,
 * anything else is critical. Two-tier rules have no critical step: only
 * counts strictly above `limit` need attention.
 */
export function classifyStatus(value: number, rule: StatusRule): PlatformStatus {
  switch (rule.kind) {
    case 'three-tier':
      if (value >= rule.attention) return 'critical'
      if (value >= rule.healthy) return 'attention'
      return 'healthy'
    case 'two-tier':
      return value > rule.limit ? 'attention' : 'healthy'
  }
}

export function describeRule(rule: StatusRule, unit = ''): string {
  const cutover = rule.kind === 'three-tier' ? rule.healthy : rule.limit
  return rule.kind === 'three-tier' ? `< ${cutover}${unit}` : `≤ ${cutover}${unit}`
}

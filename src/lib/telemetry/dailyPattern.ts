/**
 * Scales `base` by a business-hours demand curve: two Gaussian bumps centred
 * on 10:30 and 14:30, weighted 0.7 and 0.5.
 */
export function applyDailyPattern(base: number, hour: number, amplitude = 0.3): number {
  const morning = Math.exp(-((hour - 10.5) ** 2) / 8)
  const afternoon = Math.exp(-((hour - 14.5) ** 2) / 10)
  const pattern = morning * 0.7 + afternoon * 0.5
  return base * (1 + amplitude * pattern)
}

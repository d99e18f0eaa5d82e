const MINUTE_MS = 60 * 1000

/**
 * Builds the sampling grid for a chart window: the current instant rounded
 * down to the interval boundary, preceded by `hours * 60 / intervalMinutes`
 * evenly spaced points.
 */
export function generateTimeBase(hours: number, intervalMinutes: number, now: Date = new Date()): Date[] {
  const current = new Date(now.getTime())
  // Without a usable step the grid is the current minute alone.
  if (!Number.isFinite(intervalMinutes) || intervalMinutes <= 0) {
    current.setSeconds(0, 0)
    return [current]
  }
  current.setMinutes(Math.floor(current.getMinutes() / intervalMinutes) * intervalMinutes, 0, 0)

  const totalPoints = Number.isFinite(hours) && hours > 0 ? Math.floor((hours * 60) / intervalMinutes) : 0
  const points: Date[] = []
  for (let i = totalPoints; i > 0; i--) {
    points.push(new Date(current.getTime() - i * intervalMinutes * MINUTE_MS))
  }
  points.push(current)
  return points
}

const pad = (value: number) => String(value).padStart(2, '0')

export function formatTimestamp(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ${pad(date.getHours())}:${pad(date.getMinutes())}`
}

const WALL_CLOCK = /^(\d{4}-\d{2}-\d{2})[T ](\d{2}:\d{2})/

/**
 * Label for a recorded timestamp in the clock it was written in, so a
 * `...Z` reading keeps its UTC hour. Other formats fall back to local time.
 */
export function recordedLabel(raw: string, parsed: Date): string {
  const match = WALL_CLOCK.exec(raw.trim())
  return match ? `${match[1]} ${match[2]}` : formatTimestamp(parsed)
}

export function formatDate(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`
}

/** Hour of day from a `YYYY-MM-DD HH:mm` label, or `fallback` when it has none. */
export function hourOfLabel(label: string, fallback = 12): number {
  const match = /\s(\d{1,2}):\d{2}/.exec(label)
  if (!match) return fallback
  const hour = Number(match[1])
  return hour >= 0 && hour <= 23 ? hour : fallback
}

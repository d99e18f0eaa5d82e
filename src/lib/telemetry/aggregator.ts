import type { MachineRecord, MachineSeries } from '@/types/machines'

/**
 * Folds per-machine series into platform series: `users` is summed, the
 * percentage metrics are averaged.
 *
 * Every record must cover the same `length` timestamps. This is not checked
 * here; a shorter series would read as zero users and skew the means.
 */
export function aggregateMachines(
  machines: Readonly<Record<string, MachineRecord>>,
  length: number
): MachineSeries {
  const records = Object.values(machines)
  const users = new Array<number>(length).fill(0)
  const memorySum = new Array<number>(length).fill(0)
  const cpuSum = new Array<number>(length).fill(0)

  for (const record of records) {
    for (let i = 0; i < length; i++) {
      users[i] += record.metrics.users[i] ?? 0
      memorySum[i] += record.metrics.memory_percent[i] ?? 0
      cpuSum[i] += record.metrics.cpu_percent[i] ?? 0
    }
  }

  const count = records.length
  return {
    users,
    memory_percent: memorySum.map((sum) => (count > 0 ? sum / count : 0)),
    cpu_percent: cpuSum.map((sum) => (count > 0 ? sum / count : 0)),
  }
}

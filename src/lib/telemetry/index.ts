export { aggregateMachines } from './aggregator'
export { applyDailyPattern } from './dailyPattern'
export {
  HISTORY_FACTORS,
  HISTORY_SEED,
  computeHistoricalStats,
  estimateHistoricalStats,
  getHistoricalStats,
  type HistoricalStatsOptions,
} from './historicalStats'
export { addNoise } from './noise'
export { buildMetricWindow, detectOutliers, injectOutliers } from './outliers'
export { formatDate, formatTimestamp, generateTimeBase, hourOfLabel, recordedLabel } from './timeBase'

export {
  FALLBACK_INPUTS,
  evaluateAnalytics,
  evaluateDataLake,
  evaluatePlatforms,
  evaluateWarehouse,
  evaluateWorkflows,
  summarizeStatuses,
} from './classifier'
export { classifyStatus, describeRule, threeTier, twoTier } from './rules'
export { buildPlatformInputs, type PlatformRecords } from './inputs'

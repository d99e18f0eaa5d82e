export * from './api'
export * from './machines'
export * from './performance'
export * from './platforms'
export * from './records'
export * from './telemetry'

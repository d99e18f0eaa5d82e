export { MetricChart } from './MetricChart'
export { toChartPoints, toOutlierMarkers, type ChartPoint, type OutlierMarker } from './chartData'

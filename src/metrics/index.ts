export { MetricsAggregator, defaultMetrics, type RecordableResult } from './aggregator.js';

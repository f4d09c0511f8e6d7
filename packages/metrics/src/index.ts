export {statusBucket, type StatusBucket} from './buckets';
export {Counter, MetricsRegistry, type MetricLabels, type MetricsRegistryOptions} from './registry';

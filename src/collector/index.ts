export { formatFailure } from './failureDetail';
export {
  ResultCollector,
  type LifecycleEvent,
  type ResultCollectorOptions,
  type SubResultFailure,
} from './resultCollector';

/**
 * Central export point for entity collection
 */

export {
  DEFAULT_CALL_TIMEOUT_MS,
  DEFAULT_MAX_ITEMS,
  EntityCollector,
  type EntityCollectorOptions,
  EntityTaskError,
  errorKindOf
} from './entity-collector';

export {
  InvalidNodeAggregateIdError,
  isValidNodeAggregateId,
  parseNodeAggregateId,
} from './identifiers.js';
export { PATH_SEPARATOR, toPathPrefix } from './paths.js';
export { getCoordinate, dimensionSpacePointHash } from './dimensions.js';

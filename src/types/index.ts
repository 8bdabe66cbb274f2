/**
 * Type exports for the elastic tabstops library.
 */

export type {
  TabStopsConfig,
  TabStops,
  TabStopsValidationResult,
  SizeFn,
  Line,
  TabSizes,
  ComputeTabSizesOptions,
  EditResult,
  FixtureTabStops,
  FixtureParams,
  TabSizesFixture,
} from './tab-stops.ts';

export {
  TabStopsError,
  ConfigurationError,
  LineRangeError,
  LineNotFoundError,
  InternalConsistencyError,
  InvalidSizeError,
} from './errors.ts';

export type { NodeColor, RBNode, WidthNode, WidthNodeUpdates } from './state.ts';

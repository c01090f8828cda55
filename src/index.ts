export { filterItems, compareMatches, type FilterMatch, type FilterResult } from './matcher/filter.js';
export { Matcher, DEFAULT_CACHE_SIZE, type GroupingOptions, type MatcherOptions } from './matcher/matcher.js';
export { LRUCache } from './matcher/lru-cache.js';
export { SimilarityIndex } from './matcher/similarity.js';
export {
  Indicators,
  Statuses,
  IndicatorSchema,
  GlobalStatusSchema,
  type Indicator,
  type IndicatorColor,
  type IndicatorKey,
  type GlobalStatus,
  type SelectionOutcome,
} from './schema/index.js';
export { Session, type SessionOptions, type MergeSummary } from './session/session.js';
export { ClosedSessionError, EmptyInputError, RenderError } from './session/errors.js';
export {
  FinderRenderer,
  runFinder,
  pick,
  type FinderOptions,
  type FinderPhase,
  type PickOptions,
} from './tui/finder.js';
export type { HeightMode } from './tui/layout.js';
export { KitTerminalBackend, type InputEvent, type TerminalBackend, type TerminalSize } from './tui/terminal.js';
export { loadConfig, ConfigSchema, type Config } from './config/loader.js';

export { aggregateCrate, aggregateCrateDocs, EMPTY_REQUEST_GUIDANCE, isEmptyRequestGuidance, USAGE_HINT } from './aggregate.ts'
export type { AggregateOptions } from './aggregate.ts'

export { defaultConfig, parseConfig, readConfig, resolveConfig } from './core/config.ts'
export type { ScoutConfig } from './core/config.ts'

export * from './sources/index.ts'

export type {
  AggregatePhase,
  AggregateProgress,
  AggregateRequest,
  BatchReport,
  CrateReport,
  EmptyRequestGuidance,
  FailedCrateReport,
  PackageReport,
} from './types.ts'

export * from './lib/research'
export * from './lib/calculations'
export { CONFIG } from './lib/config'
export { ValidationError, getErrorMessage } from './lib/utils/errors'
export type { ValidationResult, StaleSeries } from './lib/utils/data-validation'
export { validateSeries, findStaleSeries, availableIndicators, getSeriesAgeInDays } from './lib/utils/data-validation'

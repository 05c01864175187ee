/**
 * Report core exports
 */

export {
  ReportDriver,
  validateReportOptions,
  DEFAULT_REPORT_OPTIONS,
  EXIT_NOT_UPGRADEABLE,
  type ReportOptions,
  type ReportContext,
  type PackageReport,
  type ReportResult,
} from './driver.js';
export { classify, isUpgrade, hasProvidingFile, UPGRADE_STATES, type UpgradeState } from './classify.js';
export {
  DistributionResolver,
  MemoryDistributionCache,
  baseDistribution,
  type DistributionCache,
} from './distribution.js';
export { displayName, fullName, type NamingContext } from './naming.js';
export { selectAll, selectPackages, type MatchKind, type Selection } from './select.js';
export { TablePrinter } from './table.js';
export { UnreachableStateError, TableShapeError } from './errors.js';

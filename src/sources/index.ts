/**
 * Source list exports
 */

export type { IndexFile, SourceEntry, SourceList, SourceType } from './types.js';
export {
  PackagesIndex,
  isFlatDistribution,
  parseOneLineSources,
  parseDeb822Sources,
  loadSourceList,
  type SourceListPaths,
} from './parser.js';
export { uriToFileName, uriSite, withTrailingSlash } from './uri.js';

// Playlist reconciliation engine: collect, merge, fan out, report

export {
  collectByMembership,
  collectByRating,
  collectRatingSnapshot,
  FIVE_STAR_THRESHOLD,
  type RatingCollectionOptions,
} from './collector.js'
export * from './executors/index.js'
export { canonicalKey, differenceByKey, keySet } from './identity.js'
export {
  DEFAULT_MERGE_CAP,
  mergeEarliestWins,
  mergeLatestOccurrence,
  sortByTimestampDesc,
} from './merger.js'
export {
  type ReplicaRunnerDeps,
  runPerReplica,
  scopeFor,
  throwIfAborted,
} from './replica-runner.js'
export {
  buildSyncResult,
  createEmptyResult,
  toFailures,
  toTrackSummaries,
} from './result-builder.js'

// Policy executors for playlist reconciliation

export {
  type BroadcastDeps,
  executeBroadcast,
  resolveBroadcastTargets,
} from './broadcast.js'
export {
  executeFullReplace,
  type FullReplaceDeps,
  replacePlaylistContents,
} from './full-replace.js'
export {
  executeIncrementalCapped,
  type IncrementalCappedDeps,
  selectEvictions,
} from './incremental-capped.js'

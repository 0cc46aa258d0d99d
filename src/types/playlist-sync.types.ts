import type { CatalogItem } from '@root/types/catalog.types.js'

export type SyncPolicy =
  | 'incremental-capped'
  | 'full-replace'
  | 'broadcast'
  | 'rating-snapshot'

/**
 * Tie-break applied when a key is seen in more than one replica.
 *
 * - `earliest-wins`: keep the earliest timestamp and attribute the item to the
 *   replica that holds it (first to add wins attribution)
 * - `latest-occurrence`: sort everything by timestamp descending and keep the
 *   first occurrence of each key (most recent rating event wins)
 */
export type MergeRule = 'earliest-wins' | 'latest-occurrence'

/** One collected observation of an item in a replica */
export interface Candidate {
  item: CatalogItem
  replicaId: string
  timestamp?: Date
}

/** Per-key accumulator used while folding candidates */
export interface MergeRecord {
  item: CatalogItem
  replicaId: string
  timestamp?: Date
}

export type ReplicaPhase = 'read' | 'write'

export type ReplicaOutcome =
  | { replicaId: string; phase: ReplicaPhase; ok: true; added: number }
  | { replicaId: string; phase: ReplicaPhase; ok: false; error: unknown }

export interface ReplicaFailure {
  replicaId: string
  phase: ReplicaPhase
  message: string
}

export interface TrackSummary {
  title: string
  artist: string
  attributedReplica: string
  /** ISO-8601, null when the item carried no timestamp */
  timestamp: string | null
}

export interface SyncResult {
  policy: SyncPolicy
  playlistName: string
  /** Items in the merged set */
  total: number
  /** Items written or appended across successful replicas */
  added: number
  /** Replicas whose write completed */
  replicasUpdated: number
  tracks: TrackSummary[]
  failures: ReplicaFailure[]
}

export interface CollectionResult {
  candidates: Candidate[]
  outcomes: ReplicaOutcome[]
}

export interface SyncInvocationOptions {
  playlistName?: string
  signal?: AbortSignal
}

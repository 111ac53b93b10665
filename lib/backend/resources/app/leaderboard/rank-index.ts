// Copyright Amazon.com, Inc. or its affiliates. All Rights Reserved.
// SPDX-License-Identifier: MIT-0
import type { RankEntry, RankedScore } from "./types"

export enum IndexState {
    /** Never filled from the score store. */
    UNBUILT = "unbuilt",
    READY = "ready",
    /** A write may be missing; must be rebuilt before use. */
    STALE = "stale"
}

export interface IndexStatus {
    state: IndexState
    /** Bumped by every write and stale marking; a rebuild only lands if it has not moved. */
    generation: number
}

/**
 * Order-statistics view of one leaderboard's current entries, ranked by
 * `(value, timestamp, playerId)`. Ranks are 1-based, distinct and consecutive.
 */
export interface RankIndex {
    readonly leaderboardId: string

    /** Replaces the player's previous key, if any, with `entry`. */
    insertOrUpdate(entry: RankEntry): Promise<void>
    top(n: number): Promise<RankedScore[]>
    rankOf(playerId: string): Promise<number | undefined>
    /** Up to `window` entries either side of the player; empty when the player is not ranked. */
    around(playerId: string, window: number): Promise<RankedScore[]>
    size(): Promise<number>
    /** Every entry in rank order. */
    entries(): Promise<RankEntry[]>
    status(): Promise<IndexStatus>
    markStale(): Promise<void>
    /**
     * Atomically replaces the whole content, unless `expectedGeneration` is
     * given and the index was written since. Returns whether it was replaced.
     */
    rebuild(entries: readonly RankEntry[], expectedGeneration?: number): Promise<boolean>
}

export const toRankedScore = (entry: RankEntry, rank: number): RankedScore => ({
    player_id: entry.playerId,
    name: entry.name,
    score: entry.value,
    timestamp: entry.timestamp,
    rank
})

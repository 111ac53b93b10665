// Copyright Amazon.com, Inc. or its affiliates. All Rights Reserved.
// SPDX-License-Identifier: MIT-0
import { ReadWriteLock } from "../util"
import type { Logger } from "../util"
import { LeaderboardError, LeaderboardErrorCode } from "./errors"
import { IndexState } from "./rank-index"
import type { RankIndex } from "./rank-index"
import type { ScoreStore } from "./score-store"
import type { Leaderboard } from "./types"

export type RankIndexFactory = (leaderboard: Leaderboard) => RankIndex

export interface RankIndexManagerProps {
    store: ScoreStore
    createIndex: RankIndexFactory
    logger: Logger
    /** How long a ready index is trusted before its status is read again. Defaults to 5 seconds. */
    statusCheckIntervalMs?: number
    /** Rebuild attempts dropped because of concurrent writes before giving up. Defaults to 3. */
    maxRebuildAttempts?: number
    now?: () => number
}

interface ManagedIndex {
    readonly index: RankIndex
    /** Shared by submissions, exclusive for rebuilds. */
    readonly lock: ReadWriteLock
    /** Set when a write from this process may be missing from the index. */
    stale: boolean
    checkedAt?: number
    recovering?: Promise<boolean>
}

const DEFAULT_STATUS_CHECK_INTERVAL_MS = 5_000
const DEFAULT_MAX_REBUILD_ATTEMPTS = 3

/**
 * Owns the rank index of every leaderboard this process serves. An index is
 * rebuilt from the score store's current-entry projection only when it was
 * never built or is marked stale, here or, for a shared index, by another
 * process. A rebuild that races with a write is dropped and retried.
 */
export class RankIndexManager {
    private readonly store: ScoreStore
    private readonly createIndex: RankIndexFactory
    private readonly logger: Logger
    private readonly statusCheckIntervalMs: number
    private readonly maxRebuildAttempts: number
    private readonly now: () => number
    private readonly managed = new Map<string, ManagedIndex>()

    constructor(props: RankIndexManagerProps) {
        this.store = props.store
        this.createIndex = props.createIndex
        this.logger = props.logger.child({ component: "RankIndexManager" })
        this.statusCheckIntervalMs = props.statusCheckIntervalMs ?? DEFAULT_STATUS_CHECK_INTERVAL_MS
        this.maxRebuildAttempts = props.maxRebuildAttempts ?? DEFAULT_MAX_REBUILD_ATTEMPTS
        this.now = props.now ?? Date.now
    }

    /** Index for queries. Waits only for a pending recovery, never for writers. */
    public async forReading(leaderboard: Leaderboard): Promise<RankIndex> {
        const managed = this.get(leaderboard)
        await this.ensureReady(leaderboard, managed)
        return managed.index
    }

    /** Runs a persist-then-index write; rebuilds of this leaderboard wait for it. */
    public async withWriter<T>(leaderboard: Leaderboard, task: (index: RankIndex) => Promise<T>): Promise<T> {
        const managed = this.get(leaderboard)
        await this.ensureReady(leaderboard, managed)
        return managed.lock.shared(() => task(managed.index))
    }

    /**
     * Flags the index for a rebuild in this process and records the marker
     * on the index itself, where other processes sharing it will see it.
     */
    public async markStale(leaderboardId: string, reason: string): Promise<void> {
        const managed = this.managed.get(leaderboardId)
        if (!managed) {
            return
        }

        managed.stale = true
        this.logger.warn({ leaderboardId, reason, code: LeaderboardErrorCode.INDEX_INCONSISTENCY }, "rank index marked stale")

        try {
            await managed.index.markStale()
        } catch (e) {
            this.logger.warn({ err: e, leaderboardId }, "could not record stale marker on rank index")
        }
    }

    public isStale(leaderboardId: string): boolean {
        return this.managed.get(leaderboardId)?.stale ?? false
    }

    /**
     * Rebuilds the index from the store when it is unbuilt or stale.
     * Returns whether a rebuild happened.
     */
    public async recover(leaderboard: Leaderboard): Promise<boolean> {
        const managed = this.get(leaderboard)
        const { index } = managed

        if (!managed.stale && (await index.status()).state === IndexState.READY) {
            managed.checkedAt = this.now()
            return false
        }

        return managed.lock.exclusive(async () => {
            for (let attempt = 1; attempt <= this.maxRebuildAttempts; attempt++) {
                const status = await index.status()
                if (!managed.stale && status.state === IndexState.READY) {
                    managed.checkedAt = this.now()
                    return false
                }

                const projection = await this.store.currentEntries(leaderboard.id)
                if (status.state === IndexState.UNBUILT) {
                    this.logger.info({ leaderboardId: leaderboard.id, entries: projection.length }, "loading rank index")
                } else {
                    this.logger.warn({
                        leaderboardId: leaderboard.id,
                        code: LeaderboardErrorCode.INDEX_INCONSISTENCY,
                        entries: projection.length
                    }, "rebuilding stale rank index")
                }

                if (await index.rebuild(projection, status.generation)) {
                    managed.stale = false
                    managed.checkedAt = this.now()
                    return true
                }
                this.logger.info({ leaderboardId: leaderboard.id, attempt }, "rank index written during rebuild, retrying")
            }

            throw LeaderboardError.storageUnavailable(
                "rank index rebuild",
                new Error(`index kept changing over ${this.maxRebuildAttempts} attempts`)
            )
        })
    }

    public forget(leaderboardId: string) {
        this.managed.delete(leaderboardId)
    }

    private async ensureReady(leaderboard: Leaderboard, managed: ManagedIndex): Promise<void> {
        const { checkedAt } = managed
        if (!managed.stale && checkedAt !== undefined && this.now() - checkedAt < this.statusCheckIntervalMs) {
            return
        }

        if (!managed.recovering) {
            managed.recovering = this.recover(leaderboard).finally(() => {
                managed.recovering = undefined
            })
        }

        await managed.recovering
    }

    private get(leaderboard: Leaderboard): ManagedIndex {
        let managed = this.managed.get(leaderboard.id)
        if (!managed) {
            managed = {
                index: this.createIndex(leaderboard),
                lock: new ReadWriteLock(),
                stale: false
            }
            this.managed.set(leaderboard.id, managed)
        }
        return managed
    }
}

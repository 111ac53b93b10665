// Copyright Amazon.com, Inc. or its affiliates. All Rights Reserved.
// SPDX-License-Identifier: MIT-0
import { KeyedMutex, retryWithBackoff } from "../util"
import type { Logger } from "../util"
import { verifySubmissionSignature } from "./credentials"
import { LeaderboardError, LeaderboardErrorCode, isLeaderboardError } from "./errors"
import type { LeaderboardRegistry } from "./leaderboard-registry"
import type { RankIndexManager } from "./rank-index-manager"
import { createSubmissionSchema, parseWith } from "./schemas"
import type { SubmissionPayload } from "./schemas"
import type { ScoreStore } from "./score-store"
import type { Leaderboard, ScoreEntry, SubmissionReceipt } from "./types"

export enum SubmissionStage {
    RECEIVED = "received",
    AUTHENTICATING = "authenticating",
    VALIDATING_POLICY = "validating-policy",
    PERSISTING = "persisting",
    INDEXING = "indexing",
    ACKNOWLEDGED = "acknowledged"
}

export interface RetryPolicy {
    maxAttempts: number
    baseDelayMs: number
    maxDelayMs: number
    wait?: (delayMs: number) => Promise<unknown>
}

export interface SubmissionGatewayProps {
    registry: LeaderboardRegistry
    store: ScoreStore
    indexes: RankIndexManager
    retry: RetryPolicy
    maxMetaLength: number
    logger: Logger
    now?: () => number
}

export interface SubmitOptions {
    /** Abandons the submission if aborted before persisting starts. */
    signal?: AbortSignal
}

const isStorageUnavailable = (e: unknown) => isLeaderboardError(e, LeaderboardErrorCode.STORAGE_UNAVAILABLE)

/**
 * Tracks where a submission is so failures can be reported as rejections
 * (before persisting) or retryable failures (persisting and after).
 */
class SubmissionTrace {
    public stage = SubmissionStage.RECEIVED

    constructor(private readonly logger: Logger) {
        this.logger.debug({ stage: this.stage }, "submission stage")
    }

    public advance(stage: SubmissionStage) {
        this.stage = stage
        this.logger.debug({ stage }, "submission stage")
    }

    public get persisting(): boolean {
        return this.stage === SubmissionStage.PERSISTING || this.stage === SubmissionStage.INDEXING
    }
}

/**
 * Accepts score submissions: authenticates them against the registry, lets the
 * score store apply the update policy, then updates the rank index. Writes for
 * one player are serialised; writes for different players run in parallel.
 */
export class SubmissionGateway {
    private readonly registry: LeaderboardRegistry
    private readonly store: ScoreStore
    private readonly indexes: RankIndexManager
    private readonly retry: RetryPolicy
    private readonly schema: ReturnType<typeof createSubmissionSchema>
    private readonly logger: Logger
    private readonly now: () => number
    private readonly playerLocks = new KeyedMutex()

    constructor(props: SubmissionGatewayProps) {
        this.registry = props.registry
        this.store = props.store
        this.indexes = props.indexes
        this.retry = props.retry
        this.schema = createSubmissionSchema(props.maxMetaLength)
        this.logger = props.logger.child({ component: "SubmissionGateway" })
        this.now = props.now ?? Date.now
    }

    public async submit(leaderboardId: string, payload: unknown, options: SubmitOptions = {}): Promise<SubmissionReceipt> {
        const logger = this.logger.child({ leaderboardId })
        const trace = new SubmissionTrace(logger)

        try {
            const submission = parseWith(this.schema, payload, LeaderboardErrorCode.MALFORMED_SUBMISSION)
            this.throwIfCancelled(options.signal, trace)

            trace.advance(SubmissionStage.AUTHENTICATING)
            const leaderboard = await this.registry.resolve(leaderboardId, { fresh: true })
            const timestamp = submission.timestamp ?? this.now()
            const knownName = await this.authenticate(leaderboard, submission, timestamp)

            trace.advance(SubmissionStage.VALIDATING_POLICY)
            const entry: ScoreEntry = {
                playerId: submission.player_id,
                value: submission.score,
                timestamp
            }
            if (submission.meta !== undefined) {
                entry.meta = submission.meta
            }
            const name = submission.name ?? knownName ?? submission.player_id
            this.throwIfCancelled(options.signal, trace)

            const receipt = await this.indexes.withWriter(leaderboard, (index) => {
                return this.playerLocks.runExclusive(`${leaderboard.id}:${entry.playerId}`, async () => {
                    this.throwIfCancelled(options.signal, trace)

                    trace.advance(SubmissionStage.PERSISTING)
                    const result = await this.withRetry("persist", () => this.store.put(leaderboard, { id: entry.playerId, name }, entry))

                    trace.advance(SubmissionStage.INDEXING)
                    try {
                        await this.withRetry("index", () => index.insertOrUpdate({ ...result.current, name }))
                    } catch (e) {
                        await this.indexes.markStale(leaderboard.id, `index update failed for player ${entry.playerId}`)
                        throw e
                    }

                    const rank = await this.withRetry("rank lookup", () => index.rankOf(entry.playerId))
                    if (rank === undefined) {
                        await this.indexes.markStale(leaderboard.id, `player ${entry.playerId} missing after index update`)
                        throw new LeaderboardError(LeaderboardErrorCode.INDEX_INCONSISTENCY, "Player missing from rank index after update", {
                            leaderboardId: leaderboard.id,
                            playerId: entry.playerId
                        })
                    }

                    return {
                        leaderboard_id: leaderboard.id,
                        player_id: result.current.playerId,
                        accepted: result.changed,
                        entry: result.current,
                        rank
                    }
                })
            })

            trace.advance(SubmissionStage.ACKNOWLEDGED)
            logger.info({ playerId: entry.playerId, accepted: receipt.accepted, rank: receipt.rank }, "score submitted")

            return receipt
        } catch (e) {
            throw this.fail(e, trace, logger)
        }
    }

    /**
     * Accepts either the leaderboard secret or an HMAC signed with the
     * player's own key. Returns the stored display name when the player is known.
     */
    private async authenticate(leaderboard: Leaderboard, submission: SubmissionPayload, timestamp: number): Promise<string | undefined> {
        if (submission.key !== undefined) {
            if (!await this.registry.authenticate(leaderboard.id, submission.key)) {
                throw LeaderboardError.authenticationFailed(leaderboard.id)
            }
            if (submission.name !== undefined) {
                return undefined
            }
            const player = await this.withRetry("player lookup", () => this.store.getPlayer(leaderboard.id, submission.player_id))
            return player?.name
        }

        const player = await this.withRetry("player lookup", () => this.store.getPlayer(leaderboard.id, submission.player_id))
        const signature = submission.k ?? ""
        const valid = player?.key !== undefined && verifySubmissionSignature(player.key, {
            timestamp,
            leaderboardSecret: leaderboard.secret,
            playerId: submission.player_id,
            score: submission.score,
            meta: submission.meta
        }, signature)

        if (!valid) {
            throw LeaderboardError.authenticationFailed(leaderboard.id)
        }
        return player?.name
    }

    private async withRetry<T>(operation: string, action: () => Promise<T>): Promise<T> {
        return retryWithBackoff(action, {
            ...this.retry,
            shouldRetry: isStorageUnavailable,
            onRetry: (error, attempt, delayMs) => {
                this.logger.warn({ err: error, operation, attempt, delayMs }, "storage unavailable, retrying")
            }
        })
    }

    private throwIfCancelled(signal: AbortSignal | undefined, trace: SubmissionTrace) {
        if (signal?.aborted) {
            throw new LeaderboardError(LeaderboardErrorCode.SUBMISSION_CANCELLED, "Submission cancelled before it was persisted", { stage: trace.stage })
        }
    }

    private fail(e: unknown, trace: SubmissionTrace, logger: Logger): unknown {
        if (trace.persisting || isStorageUnavailable(e)) {
            logger.error({ err: e, stage: trace.stage }, "submission failed")
            return new LeaderboardError(
                LeaderboardErrorCode.SUBMISSION_FAILED,
                `Submission failed while ${trace.stage}`,
                { stage: trace.stage, persisted: trace.stage === SubmissionStage.INDEXING },
                { cause: e }
            )
        }

        if (isLeaderboardError(e)) {
            logger.info({ code: e.code, stage: trace.stage }, "submission rejected")
            return e
        }

        logger.error({ err: e, stage: trace.stage }, "unexpected submission error")
        return e
    }
}

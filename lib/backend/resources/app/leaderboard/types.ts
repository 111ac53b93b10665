// Copyright Amazon.com, Inc. or its affiliates. All Rights Reserved.
// SPDX-License-Identifier: MIT-0

export enum ScoreOrdering {
    HIGHER_IS_BETTER = "higher-is-better",
    LOWER_IS_BETTER = "lower-is-better"
}

export enum UpdatePolicy {
    KEEP_BEST = "keep-best",
    KEEP_LATEST = "keep-latest",
    KEEP_ALL = "keep-all"
}

export interface Leaderboard {
    id: string
    secret: string
    name: string
    ordering: ScoreOrdering
    updatePolicy: UpdatePolicy
    createdAt: Date
    deletedAt?: Date
}

export interface Player {
    leaderboardId: string
    id: string
    name: string
    /** Signing key for HMAC submissions, only set for provisioned players */
    key?: string
}

export interface ScoreEntry {
    playerId: string
    value: number
    /** Milliseconds since the epoch, as reported by the client */
    timestamp: number
    meta?: string
}

/** What the rank index holds for each ranked player. */
export interface RankEntry extends ScoreEntry {
    name: string
}

export interface RankedScore {
    player_id: string
    name: string
    score: number
    timestamp: number
    rank: number
}

export interface PutResult {
    current: ScoreEntry
    previous?: ScoreEntry
    /** Whether the submitted entry became the current one */
    changed: boolean
}

export interface SubmissionReceipt {
    leaderboard_id: string
    player_id: string
    accepted: boolean
    entry: ScoreEntry
    rank: number
}

/** Leaderboard as exposed to anyone but its owner. */
export type PublicLeaderboard = Omit<Leaderboard, "secret">

export const toPublicLeaderboard = (leaderboard: Leaderboard): PublicLeaderboard => {
    const { secret: _secret, ...rest } = leaderboard
    return rest
}

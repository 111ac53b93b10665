// Copyright Amazon.com, Inc. or its affiliates. All Rights Reserved.
// SPDX-License-Identifier: MIT-0
import { ScoreOrdering, UpdatePolicy } from "./types"
import type { ScoreEntry } from "./types"

/**
 * Negative when `a` is the better value under `ordering`.
 */
export const compareValues = (ordering: ScoreOrdering, a: number, b: number): number => {
    if (a === b) {
        return 0
    }
    if (ordering === ScoreOrdering.HIGHER_IS_BETTER) {
        return a > b ? -1 : 1
    }
    return a < b ? -1 : 1
}

const compareIds = (a: string, b: string): number => {
    if (a === b) {
        return 0
    }
    return a < b ? -1 : 1
}

/**
 * Total order used for ranking: value under the ordering policy, then the
 * earliest timestamp, then player id.
 */
export const compareEntries = (ordering: ScoreOrdering, a: ScoreEntry, b: ScoreEntry): number => {
    return compareValues(ordering, a.value, b.value)
        || a.timestamp - b.timestamp
        || compareIds(a.playerId, b.playerId)
}

/** Best entry of one player's history: best value, earliest timestamp. */
export const bestEntry = (ordering: ScoreOrdering, entries: readonly ScoreEntry[]): ScoreEntry | undefined => {
    let best: ScoreEntry | undefined
    for (const entry of entries) {
        if (!best || compareValues(ordering, entry.value, best.value) < 0
            || (entry.value === best.value && entry.timestamp < best.timestamp)) {
            best = entry
        }
    }
    return best
}

export type PolicyDecision =
    | { kind: "replace", current: ScoreEntry, superseded?: ScoreEntry, appendHistory: boolean }
    | { kind: "retain", current: ScoreEntry, appendHistory: boolean }

/**
 * Decides what a new submission does to a player's current entry.
 */
export const decideUpdate = (
    policy: UpdatePolicy,
    ordering: ScoreOrdering,
    current: ScoreEntry | undefined,
    candidate: ScoreEntry
): PolicyDecision => {
    const appendHistory = policy === UpdatePolicy.KEEP_ALL

    if (!current) {
        return { kind: "replace", current: candidate, appendHistory }
    }

    switch (policy) {
        case UpdatePolicy.KEEP_LATEST:
            return { kind: "replace", current: candidate, superseded: current, appendHistory }
        case UpdatePolicy.KEEP_BEST:
            if (compareValues(ordering, candidate.value, current.value) < 0) {
                return { kind: "replace", current: candidate, superseded: current, appendHistory }
            }
            return { kind: "retain", current, appendHistory }
        case UpdatePolicy.KEEP_ALL: {
            const valueOrder = compareValues(ordering, candidate.value, current.value)
            if (valueOrder < 0 || (valueOrder === 0 && candidate.timestamp < current.timestamp)) {
                return { kind: "replace", current: candidate, superseded: current, appendHistory }
            }
            return { kind: "retain", current, appendHistory }
        }
    }
}

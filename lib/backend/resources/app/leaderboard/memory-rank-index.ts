// Copyright Amazon.com, Inc. or its affiliates. All Rights Reserved.
// SPDX-License-Identifier: MIT-0
import { compareEntries } from "./ordering"
import { IndexState, toRankedScore } from "./rank-index"
import type { IndexStatus, RankIndex } from "./rank-index"
import type { RankEntry, RankedScore, ScoreOrdering } from "./types"

type Comparator = (a: RankEntry, b: RankEntry) => number

/**
 * Node of a persistent treap: every update copies the path it touches, so a
 * root, once published, never changes.
 */
interface TreeNode {
    readonly entry: RankEntry
    readonly priority: number
    readonly size: number
    readonly left: TreeNode | null
    readonly right: TreeNode | null
}

const sizeOf = (node: TreeNode | null): number => node ? node.size : 0

const makeNode = (entry: RankEntry, priority: number, left: TreeNode | null, right: TreeNode | null): TreeNode => ({
    entry,
    priority,
    left,
    right,
    size: sizeOf(left) + sizeOf(right) + 1
})

/** Splits into entries ordered before `key` and the rest. */
const split = (node: TreeNode | null, key: RankEntry, compare: Comparator): [TreeNode | null, TreeNode | null] => {
    if (!node) {
        return [null, null]
    }

    if (compare(node.entry, key) < 0) {
        const [less, rest] = split(node.right, key, compare)
        return [makeNode(node.entry, node.priority, node.left, less), rest]
    }

    const [less, rest] = split(node.left, key, compare)
    return [less, makeNode(node.entry, node.priority, rest, node.right)]
}

/** Every entry of `a` must order before every entry of `b`. */
const merge = (a: TreeNode | null, b: TreeNode | null): TreeNode | null => {
    if (!a) {
        return b
    }
    if (!b) {
        return a
    }

    if (a.priority > b.priority) {
        return makeNode(a.entry, a.priority, a.left, merge(a.right, b))
    }
    return makeNode(b.entry, b.priority, merge(a, b.left), b.right)
}

const insert = (root: TreeNode | null, entry: RankEntry, compare: Comparator): TreeNode | null => {
    const [less, rest] = split(root, entry, compare)
    return merge(merge(less, makeNode(entry, Math.random(), null, null)), rest)
}

const remove = (node: TreeNode | null, key: RankEntry, compare: Comparator): TreeNode | null => {
    if (!node) {
        return null
    }

    const order = compare(key, node.entry)
    if (order === 0) {
        return merge(node.left, node.right)
    }
    if (order < 0) {
        return makeNode(node.entry, node.priority, remove(node.left, key, compare), node.right)
    }
    return makeNode(node.entry, node.priority, node.left, remove(node.right, key, compare))
}

const countBefore = (root: TreeNode | null, key: RankEntry, compare: Comparator): number => {
    let count = 0
    let node = root

    while (node) {
        if (compare(node.entry, key) < 0) {
            count += sizeOf(node.left) + 1
            node = node.right
        } else {
            node = node.left
        }
    }

    return count
}

/** In-order entries at positions `[start, end)`. */
const collect = (node: TreeNode | null, start: number, end: number, offset: number, out: RankEntry[]) => {
    if (!node || start >= end) {
        return
    }

    const position = offset + sizeOf(node.left)
    if (start < position) {
        collect(node.left, start, end, offset, out)
    }
    if (start <= position && position < end) {
        out.push(node.entry)
    }
    if (end > position + 1) {
        collect(node.right, start, end, position + 1, out)
    }
}

const build = (sorted: readonly RankEntry[], from: number, to: number, depth: number): TreeNode | null => {
    if (from >= to) {
        return null
    }

    // Priorities fall with depth so the balanced build is also a valid heap.
    const middle = (from + to) >>> 1
    const priority = 1 - depth / 64 + Math.random() / 1024
    return makeNode(sorted[middle], priority, build(sorted, from, middle, depth + 1), build(sorted, middle + 1, to, depth + 1))
}

/**
 * In-process rank index. Each write publishes a new treap root; the player
 * lookup is a plain map that only writers touch, updated in the same
 * synchronous step as the root, so no read ever sees the two out of step.
 */
export class MemoryRankIndex implements RankIndex {
    private root: TreeNode | null = null
    private byPlayer = new Map<string, RankEntry>()
    private generation = 0
    private built = false
    private stale = false
    private readonly compare: Comparator

    constructor(public readonly leaderboardId: string, ordering: ScoreOrdering) {
        this.compare = (a, b) => compareEntries(ordering, a, b)
    }

    async insertOrUpdate(entry: RankEntry): Promise<void> {
        const previous = this.byPlayer.get(entry.playerId)
        const withoutPrevious = previous ? remove(this.root, previous, this.compare) : this.root

        this.root = insert(withoutPrevious, entry, this.compare)
        this.byPlayer.set(entry.playerId, entry)
        this.generation++
    }

    async top(n: number): Promise<RankedScore[]> {
        const root = this.root
        const entries: RankEntry[] = []
        collect(root, 0, Math.min(n, sizeOf(root)), 0, entries)

        return entries.map((entry, i) => toRankedScore(entry, i + 1))
    }

    async rankOf(playerId: string): Promise<number | undefined> {
        const entry = this.byPlayer.get(playerId)

        return entry ? countBefore(this.root, entry, this.compare) + 1 : undefined
    }

    async around(playerId: string, window: number): Promise<RankedScore[]> {
        const root = this.root
        const entry = this.byPlayer.get(playerId)
        if (!entry) {
            return []
        }

        const position = countBefore(root, entry, this.compare)
        const start = Math.max(0, position - window)
        const end = Math.min(sizeOf(root), position + window + 1)
        const entries: RankEntry[] = []
        collect(root, start, end, 0, entries)

        return entries.map((e, i) => toRankedScore(e, start + i + 1))
    }

    async size(): Promise<number> {
        return sizeOf(this.root)
    }

    async entries(): Promise<RankEntry[]> {
        const root = this.root
        const entries: RankEntry[] = []
        collect(root, 0, sizeOf(root), 0, entries)

        return entries
    }

    async status(): Promise<IndexStatus> {
        const state = this.stale ? IndexState.STALE : this.built ? IndexState.READY : IndexState.UNBUILT
        return { state, generation: this.generation }
    }

    async markStale(): Promise<void> {
        this.stale = true
        this.generation++
    }

    async rebuild(entries: readonly RankEntry[], expectedGeneration?: number): Promise<boolean> {
        if (expectedGeneration !== undefined && expectedGeneration !== this.generation) {
            return false
        }

        const byPlayer = new Map<string, RankEntry>()
        for (const entry of entries) {
            const existing = byPlayer.get(entry.playerId)
            if (!existing || this.compare(entry, existing) < 0) {
                byPlayer.set(entry.playerId, entry)
            }
        }

        const sorted = [...byPlayer.values()].sort(this.compare)
        this.root = build(sorted, 0, sorted.length, 0)
        this.byPlayer = byPlayer
        this.built = true
        this.stale = false
        return true
    }
}

// Copyright Amazon.com, Inc. or its affiliates. All Rights Reserved.
// SPDX-License-Identifier: MIT-0

export class Mutex {
    private tail: Promise<void> = Promise.resolve()

    public async runExclusive<T>(task: () => Promise<T>): Promise<T> {
        const previous = this.tail
        let release: () => void = () => undefined
        const current = new Promise<void>((resolve) => {
            release = resolve
        })
        this.tail = previous.then(() => current)

        await previous
        try {
            return await task()
        } finally {
            release()
        }
    }
}

interface KeyedEntry {
    mutex: Mutex
    holders: number
}

/**
 * One mutex per key, dropped once nobody holds or waits on it.
 */
export class KeyedMutex {
    private readonly entries = new Map<string, KeyedEntry>()

    public async runExclusive<T>(key: string, task: () => Promise<T>): Promise<T> {
        const entry = this.entries.get(key) ?? { mutex: new Mutex(), holders: 0 }
        this.entries.set(key, entry)
        entry.holders++

        try {
            return await entry.mutex.runExclusive(task)
        } finally {
            entry.holders--
            if (entry.holders === 0) {
                this.entries.delete(key)
            }
        }
    }

    public get size(): number {
        return this.entries.size
    }
}

interface Waiter {
    exclusive: boolean
    resolve: () => void
}

/**
 * Many shared holders or a single exclusive holder. Waiters are admitted in
 * arrival order, so a queued exclusive holder is not starved by a stream of
 * shared ones.
 */
export class ReadWriteLock {
    private sharedHolders = 0
    private exclusiveHeld = false
    private readonly waiting: Waiter[] = []

    public async shared<T>(task: () => Promise<T>): Promise<T> {
        await this.acquire(false)
        try {
            return await task()
        } finally {
            this.release(false)
        }
    }

    public async exclusive<T>(task: () => Promise<T>): Promise<T> {
        await this.acquire(true)
        try {
            return await task()
        } finally {
            this.release(true)
        }
    }

    private acquire(exclusive: boolean): Promise<void> {
        if (this.waiting.length === 0 && this.canEnter(exclusive)) {
            this.enter(exclusive)
            return Promise.resolve()
        }

        return new Promise<void>((resolve) => {
            this.waiting.push({ exclusive, resolve })
        })
    }

    private canEnter(exclusive: boolean): boolean {
        if (exclusive) {
            return !this.exclusiveHeld && this.sharedHolders === 0
        }
        return !this.exclusiveHeld
    }

    private enter(exclusive: boolean) {
        if (exclusive) {
            this.exclusiveHeld = true
        } else {
            this.sharedHolders++
        }
    }

    private release(exclusive: boolean) {
        if (exclusive) {
            this.exclusiveHeld = false
        } else {
            this.sharedHolders--
        }

        while (this.waiting.length > 0) {
            const next = this.waiting[0]
            if (!this.canEnter(next.exclusive)) {
                return
            }

            this.waiting.shift()
            this.enter(next.exclusive)
            next.resolve()

            if (next.exclusive) {
                return
            }
        }
    }
}

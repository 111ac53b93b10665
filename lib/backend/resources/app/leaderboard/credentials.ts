// Copyright Amazon.com, Inc. or its affiliates. All Rights Reserved.
// SPDX-License-Identifier: MIT-0
import { createHash, createHmac, randomBytes, timingSafeEqual } from "node:crypto"

export interface SignedFields {
    timestamp: number
    leaderboardSecret: string
    playerId: string
    score: number
    meta?: string
}

/** Compares SHA-256 digests of both sides with `timingSafeEqual`. */
export const constantTimeEquals = (expected: string, supplied: string): boolean => {
    const expectedDigest = createHash("sha256").update(expected).digest()
    const suppliedDigest = createHash("sha256").update(supplied).digest()

    return timingSafeEqual(expectedDigest, suppliedDigest)
}

export const signSubmission = (playerKey: string, fields: SignedFields): string => {
    return createHmac("sha256", playerKey)
        .update(`${fields.timestamp}:${fields.leaderboardSecret}:${fields.playerId}:${fields.score}:${fields.meta ?? ""}`)
        .digest("hex")
}

export const verifySubmissionSignature = (playerKey: string, fields: SignedFields, signature: string): boolean => {
    return constantTimeEquals(signSubmission(playerKey, fields), signature.toLowerCase())
}

export const generateSecret = (): string => {
    return randomBytes(32).toString("hex")
}

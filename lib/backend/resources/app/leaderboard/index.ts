// Copyright Amazon.com, Inc. or its affiliates. All Rights Reserved.
// SPDX-License-Identifier: MIT-0
export * from "./credentials"
export * from "./errors"
export * from "./leaderboard-registry"
export * from "./leaderboard-repository"
export * from "./memory-rank-index"
export * from "./memory-score-store"
export * from "./ordering"
export * from "./player-service"
export * from "./query-service"
export * from "./rank-index"
export * from "./rank-index-manager"
export * from "./rds-leaderboard-repository"
export * from "./rds-rank-index"
export * from "./rds-score-store"
export * from "./redis-rank-index"
export * from "./schemas"
export * from "./score-store"
export * from "./submission-gateway"
export * from "./types"

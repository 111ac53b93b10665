// Copyright Amazon.com, Inc. or its affiliates. All Rights Reserved.
// SPDX-License-Identifier: MIT-0
export * from "./backend-type"
export * from "./concurrency"
export * from "./config"
export * from "./connection-manager"
export * from "./logger"
export * from "./name-generator"
export * from "./retry"

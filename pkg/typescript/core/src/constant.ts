// SPDX-License-Identifier: MIT
// Copyright (c) 2025 ReifyDB

export const NULL_LITERAL = "null";

export const EMPTY_TEXT = "";

// SPDX-License-Identifier: MIT
// Copyright (c) 2025 ReifyDB

import {defineWorkspace} from 'vitest/config';

export default defineWorkspace([
    'pkg/typescript/core',
    'pkg/typescript/sql',
]);

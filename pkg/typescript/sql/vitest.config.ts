// SPDX-License-Identifier: MIT
// Copyright (c) 2025 ReifyDB

import {defineConfig} from 'vitest/config';
import {resolve} from 'path';

export default defineConfig({
    test: {
        name: 'sql',
        environment: 'node',
        testTimeout: 1000,
        hookTimeout: 1000,
        teardownTimeout: 1000,

        include: [
            'tests/**/*.{test,spec}.ts',
        ],
        exclude: [
            'node_modules/**',
            'dist/**',
        ],

        env: {
            NODE_ENV: 'test',
        }
    },

    resolve: {
        alias: {
            '@nullwrap/core': resolve(__dirname, '../core/src/index.ts'),
        }
    },

    esbuild: {
        target: 'es2022'
    }
});

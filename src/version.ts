// Copyright 2026 Layne Penney
// SPDX-License-Identifier: Apache-2.0

/**
 * Groundwork version.
 * Keep this in sync with package.json version.
 *
 * Versioning convention:
 * - MAJOR: Breaking changes to the library API, CLI or index format
 * - MINOR: New features, non-breaking changes
 * - PATCH: Bug fixes, minor improvements
 */
export const VERSION = '0.3.0';

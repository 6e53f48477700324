// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@reclaim/db-schema`
 * Purpose: Root barrel re-exporting all schema slices.
 * Scope: Re-exports only. Does not define any tables.
 * Side-effects: none
 * @public
 */

export * from "./recycling";

/**
 * Version constants shared by the snapshot writer and its consumers.
 */

/**
 * Library semantic version.
 *
 * IMPORTANT: This must stay in sync with packages/core/package.json version.
 */
export const CORE_VERSION = '0.1.0';

/**
 * Snapshot document schema version, written as `schema_version`.
 *
 * Increment whenever the document shape changes. Consumers compare it before
 * reading collections they depend on.
 *
 * History:
 * - 3: vehicles, lines, stations, paths, signals
 * - 4: adds `tracks` (per-edge polylines with a kind tag)
 */
export const SNAPSHOT_SCHEMA_VERSION = 4;

/**
 * Tenant Observation Module
 *
 * Builds the observation the reconciler records after syncing a tenant and
 * decides whether a tenant's desired state still matches that observation.
 */

import type {
  RetentionPolicy,
  TenantObservation,
  TenantParameters,
} from '@root/types/tenant.types.js'

/**
 * Formats a date as an RFC 3339 UTC timestamp with second precision
 */
export function formatTimestamp(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, 'Z')
}

/**
 * Compares two string sequences element by element, treating an absent
 * sequence and an empty one as equal.
 */
export function stringSlicesEqual(
  a: readonly string[] | undefined,
  b: readonly string[] | undefined,
): boolean {
  const left = a ?? []
  const right = b ?? []
  if (left.length !== right.length) {
    return false
  }
  return left.every((value, index) => value === right[index])
}

function retentionEqual(a: RetentionPolicy, b: RetentionPolicy): boolean {
  return (
    (a.logs ?? '') === (b.logs ?? '') &&
    (a.metrics ?? '') === (b.metrics ?? '') &&
    (a.traces ?? '') === (b.traces ?? '') &&
    (a.profiles ?? '') === (b.profiles ?? '')
  )
}

/**
 * Compares desired state against the last observation, field by field.
 * This is the only local criterion for a tenant being up to date.
 *
 * @param spec - Desired state
 * @param observation - Last recorded observation
 * @returns True if nothing changed since the observation was taken
 */
export function isUpToDate(
  spec: TenantParameters,
  observation: TenantObservation,
): boolean {
  return (
    spec.tenantId === observation.tenantId &&
    spec.orgId === observation.orgId &&
    retentionEqual(spec.retention, observation.retention) &&
    stringSlicesEqual(spec.admins, observation.admins) &&
    stringSlicesEqual(spec.viewerGroups, observation.viewerGroups) &&
    stringSlicesEqual(spec.editorGroups, observation.editorGroups) &&
    stringSlicesEqual(spec.adminGroups, observation.adminGroups)
  )
}

/**
 * Copies desired state into a fresh observation stamped with the given time
 *
 * @param spec - Desired state
 * @param now - Synchronization time
 */
export function buildObservation(
  spec: TenantParameters,
  now: Date,
): TenantObservation {
  return {
    tenantId: spec.tenantId,
    orgId: spec.orgId,
    admins: [...(spec.admins ?? [])],
    viewerGroups: [...(spec.viewerGroups ?? [])],
    editorGroups: [...(spec.editorGroups ?? [])],
    adminGroups: [...(spec.adminGroups ?? [])],
    retention: { ...spec.retention },
    lastUpdated: formatTimestamp(now),
  }
}

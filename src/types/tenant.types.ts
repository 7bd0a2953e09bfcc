/**
 * Retention durations per signal type (e.g. "30d", "24h", "1w").
 * Stored and reported verbatim, never interpreted.
 */
export interface RetentionPolicy {
  logs?: string
  metrics?: string
  traces?: string
  profiles?: string
}

/**
 * Desired state of a tenant as declared by its owner
 */
export interface TenantParameters {
  tenantId: string
  orgId: string
  admins?: string[]
  viewerGroups?: string[]
  editorGroups?: string[]
  adminGroups?: string[]
  retention: RetentionPolicy
}

/**
 * Last-synchronized snapshot of a tenant's parameters
 */
export interface TenantObservation {
  tenantId: string
  orgId: string
  admins: string[]
  viewerGroups: string[]
  editorGroups: string[]
  adminGroups: string[]
  retention: RetentionPolicy
  /** ISO-8601 UTC timestamp of the last synchronization attempt */
  lastUpdated: string
}

export type TenantReadyCondition =
  | 'Available'
  | 'Creating'
  | 'Deleting'
  | 'ReconcileError'

export interface TenantConditions {
  ready: TenantReadyCondition
  message: string | null
  lastReconciledAt: string | null
}

export interface TenantStatus {
  atProvider: TenantObservation | null
  conditions: TenantConditions
}

/**
 * A stored tenant resource: desired state plus reconciler-owned status
 */
export interface Tenant {
  kind: 'Tenant'
  /** Resource identity, distinct from spec.tenantId */
  uid: string
  name: string
  spec: TenantParameters
  status: TenantStatus
  /** Deletion marker; set when the owner asked for removal */
  deletionRequestedAt: string | null
  created_at: string
  updated_at: string
}

/**
 * Anything the reconciler may be handed; only `Tenant` is accepted
 */
export interface ManagedResource {
  kind: string
  uid: string
  name: string
}

export interface TenantCreate {
  name: string
  spec: TenantParameters
}

/**
 * Fields of a tenant that contribute entries to the org mapping
 */
export interface TenantMapping {
  orgId: string
  viewerGroups?: string[]
  editorGroups?: string[]
  adminGroups?: string[]
}

export type OrgRole = 'Viewer' | 'Editor' | 'Admin'

export interface MappingEntry {
  subject: string
  orgId: string
  role: OrgRole
}

/**
 * Reconciliation state of a single tenant
 */
export type TenantState = 'Absent' | 'ExistsNotSynced' | 'Synced'

export interface TenantReconcileResult {
  uid: string
  name: string
  state: TenantState
  action: 'none' | 'created' | 'updated' | 'deleted'
}

export interface ReconcileSweepResult {
  processed: number
  created: number
  updated: number
  deleted: number
  unchanged: number
  skipped: number
  failed: number
}

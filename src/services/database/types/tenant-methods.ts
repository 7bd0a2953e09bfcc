import type {
  Tenant,
  TenantConditions,
  TenantCreate,
  TenantObservation,
  TenantParameters,
} from '@root/types/tenant.types.js'

declare module '../../database.service.js' {
  interface DatabaseService {
    // TENANT METHODS
    /**
     * Lists all tenants ordered by tenantId
     * @returns Promise resolving to every stored tenant
     */
    listTenants(): Promise<Tenant[]>

    /**
     * Retrieves a tenant by uid
     * @param uid - Resource identity
     */
    getTenant(uid: string): Promise<Tenant | undefined>

    /**
     * Retrieves a tenant by name
     * @param name - Unique resource name
     */
    getTenantByName(name: string): Promise<Tenant | undefined>

    /**
     * Stores a new tenant record
     * @param data - Name and desired state
     */
    createTenant(data: TenantCreate): Promise<Tenant>

    /**
     * Replaces a tenant's desired state
     * @returns Promise resolving to true if the tenant exists
     */
    updateTenantSpec(uid: string, spec: TenantParameters): Promise<boolean>

    /**
     * Sets the deletion marker on a tenant
     * @returns Promise resolving to true if the tenant exists
     */
    markTenantForDeletion(uid: string): Promise<boolean>

    /**
     * Persists the reconciler's observation of a tenant
     */
    setTenantObservation(
      uid: string,
      observation: TenantObservation,
    ): Promise<boolean>

    /**
     * Persists the outcome of the latest reconciliation
     */
    setTenantConditions(
      uid: string,
      conditions: TenantConditions,
    ): Promise<boolean>

    /**
     * Removes a tenant record permanently
     */
    removeTenant(uid: string): Promise<boolean>
  }
}

import { ConflictError } from '@root/types/errors.js'
import type { Tenant } from '@root/types/tenant.types.js'

export const DUPLICATE_TENANT_MESSAGE = 'tenant with this tenantId already exists'

/**
 * Ensures no other tenant resource claims the same tenantId.
 *
 * Only run before a create; two creates racing with the same tenantId are
 * not detected.
 *
 * @param tenant - The tenant about to be created
 * @param tenants - Every known tenant, possibly including `tenant` itself
 * @throws ConflictError when another resource has the same tenantId
 */
export function validateUniqueTenantId(
  tenant: Tenant,
  tenants: readonly Tenant[],
): void {
  const duplicate = tenants.find(
    (other) =>
      other.uid !== tenant.uid && other.spec.tenantId === tenant.spec.tenantId,
  )
  if (duplicate) {
    throw new ConflictError(
      `${DUPLICATE_TENANT_MESSAGE}: ${tenant.spec.tenantId}`,
    )
  }
}

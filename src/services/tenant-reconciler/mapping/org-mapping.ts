/**
 * Org Mapping Codec
 *
 * Builds and queries Grafana's `orgMapping` setting: a comma-separated list of
 * `subject:orgId:Role` entries. Grafana uses `:` as its field delimiter, so a
 * literal colon inside a group claim is written as `\:`. The orgId and role
 * are never escaped.
 */

import type {
  MappingEntry,
  OrgRole,
  TenantMapping,
} from '@root/types/tenant.types.js'

const ORG_ROLES: readonly OrgRole[] = ['Viewer', 'Editor', 'Admin']

/**
 * Escapes colons in a group claim for use as an org mapping subject
 */
export function escapeSubject(subject: string): string {
  return subject.replaceAll(':', '\\:')
}

/**
 * Reverses {@link escapeSubject}
 */
export function unescapeSubject(subject: string): string {
  return subject.replaceAll('\\:', ':')
}

/**
 * Produces the org mapping value for a set of tenants.
 *
 * Entries are emitted per tenant in input order: every viewer group, then
 * every editor group, then every admin group. A tenant without groups
 * contributes nothing and an empty input yields the empty string.
 *
 * @param tenants - Tenants in the order they should appear
 * @returns The serialized org mapping
 */
export function encodeOrgMapping(tenants: readonly TenantMapping[]): string {
  const entries: string[] = []

  for (const tenant of tenants) {
    for (const group of tenant.viewerGroups ?? []) {
      entries.push(formatEntry(group, tenant.orgId, 'Viewer'))
    }
    for (const group of tenant.editorGroups ?? []) {
      entries.push(formatEntry(group, tenant.orgId, 'Editor'))
    }
    for (const group of tenant.adminGroups ?? []) {
      entries.push(formatEntry(group, tenant.orgId, 'Admin'))
    }
  }

  return entries.join(',')
}

function formatEntry(subject: string, orgId: string, role: OrgRole): string {
  return `${escapeSubject(subject)}:${orgId}:${role}`
}

/**
 * Splits a string on a delimiter, skipping delimiters preceded by a backslash.
 * Escape sequences are kept intact in the returned parts. A backslash before
 * any other character is literal, since the encoder never escapes backslashes.
 */
function splitUnescaped(value: string, delimiter: string): string[] {
  const parts: string[] = []
  let current = ''

  for (let i = 0; i < value.length; i++) {
    const char = value[i]
    if (char === '\\' && value[i + 1] === delimiter) {
      current += char + delimiter
      i++
      continue
    }
    if (char === delimiter) {
      parts.push(current)
      current = ''
      continue
    }
    current += char
  }
  parts.push(current)

  return parts
}

/**
 * Splits an org mapping into its entries. Whitespace around each entry is
 * trimmed and empty entries are dropped.
 *
 * @param orgMapping - The serialized org mapping
 * @returns Raw entries, still escaped
 */
export function splitOrgMapping(orgMapping: string): string[] {
  return splitUnescaped(orgMapping, ',')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0)
}

/**
 * Parses a single raw entry into its subject, orgId and role.
 *
 * @param entry - One entry as returned by {@link splitOrgMapping}
 * @returns The parsed entry, or null when it is not `subject:orgId:Role`
 */
export function parseOrgMappingEntry(entry: string): MappingEntry | null {
  const parts = splitUnescaped(entry.trim(), ':')
  if (parts.length < 3) {
    return null
  }

  const role = parts[parts.length - 1]
  if (!isOrgRole(role)) {
    return null
  }

  const orgId = parts.slice(1, -1).join(':')
  if (!parts[0] || !orgId) {
    return null
  }

  return { subject: unescapeSubject(parts[0]), orgId, role }
}

function isOrgRole(value: string): value is OrgRole {
  return ORG_ROLES.some((role) => role === value)
}

/**
 * Checks whether the org mapping holds the self-referential default viewer
 * entry `<orgId>:<orgId>:Viewer` for the given org.
 *
 * @param orgMapping - The serialized org mapping
 * @param orgId - The org to look for
 * @returns True if the entry is present
 */
export function orgMappingContains(orgMapping: string, orgId: string): boolean {
  const expected = `${orgId}:${orgId}:Viewer`
  return splitOrgMapping(orgMapping).some((entry) => entry === expected)
}

/**
 * Global test setup and teardown
 */

export async function setup(): Promise<void> {
  process.env.NODE_ENV = 'test'
  process.env.logLevel = 'silent'
  process.env.port = '3011'
  process.env.grafanaUrl = 'http://grafana.test'
  process.env.grafanaCredentials = 'test-token'
  process.env.grafanaSsoProvider = 'generic_oauth'
  process.env.grafanaTimeoutMs = '2000'
  // Tests drive reconciliation through the API
  process.env.reconcileIntervalSeconds = '0'
}

export async function teardown(): Promise<void> {
  try {
    const { cleanupTestDatabases } = await import('../helpers/database.js')
    await cleanupTestDatabases()
  } catch (error) {
    console.error('Failed to cleanup test databases:', error)
  }
}

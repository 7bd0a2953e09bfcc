import type {
  DbSchedule,
  JobRunInfo,
  ScheduleUpdate,
} from '@root/types/scheduler.types.js'
import type { DatabaseService } from '@services/database.service.js'
import { z } from 'zod'

interface ScheduleRow {
  id: number
  name: string
  type: string
  config: string
  enabled: boolean | number
  last_run: string | null
  next_run: string | null
  created_at: string
  updated_at: string
}

const IntervalConfigSchema = z.object({
  days: z.number().optional(),
  hours: z.number().optional(),
  minutes: z.number().optional(),
  seconds: z.number().optional(),
  runImmediately: z.boolean().optional(),
})

const JobRunInfoSchema = z.object({
  time: z.string(),
  status: z.enum(['completed', 'failed', 'pending']),
  error: z.string().optional(),
  estimated: z.boolean().optional(),
})

function parseRunInfo(
  this: DatabaseService,
  value: string | null,
  field: string,
): JobRunInfo | null {
  if (!value) return null
  try {
    return JobRunInfoSchema.parse(JSON.parse(value))
  } catch (error) {
    this.log.warn({ error }, `Ignoring malformed ${field}`)
    return null
  }
}

/**
 * Parses a raw schedule row into a typed DbSchedule
 */
function parseScheduleRow(
  this: DatabaseService,
  row: ScheduleRow,
): DbSchedule | null {
  if (row.type !== 'interval') {
    this.log.warn(`Unknown schedule type: ${row.type}`)
    return null
  }

  try {
    return {
      id: row.id,
      name: row.name,
      type: 'interval',
      config: IntervalConfigSchema.parse(JSON.parse(row.config)),
      enabled: Boolean(row.enabled),
      last_run: parseRunInfo.call(this, row.last_run, 'schedule.last_run'),
      next_run: parseRunInfo.call(this, row.next_run, 'schedule.next_run'),
      created_at: row.created_at,
      updated_at: row.updated_at,
    }
  } catch (error) {
    this.log.error({ error }, `Error parsing schedule ${row.name}`)
    return null
  }
}

/**
 * Retrieves a schedule by name
 *
 * @param name - Job name
 * @returns The schedule, or null if none is stored
 */
export async function getScheduleByName(
  this: DatabaseService,
  name: string,
): Promise<DbSchedule | null> {
  const row = await this.knex<ScheduleRow>('schedules').where({ name }).first()
  return row ? parseScheduleRow.call(this, row) : null
}

/**
 * Creates a schedule
 */
export async function createSchedule(
  this: DatabaseService,
  schedule: Omit<DbSchedule, 'id' | 'created_at' | 'updated_at'>,
): Promise<DbSchedule | null> {
  await this.knex('schedules').insert({
    name: schedule.name,
    type: schedule.type,
    config: JSON.stringify(schedule.config),
    enabled: schedule.enabled,
    last_run: schedule.last_run ? JSON.stringify(schedule.last_run) : null,
    next_run: schedule.next_run ? JSON.stringify(schedule.next_run) : null,
    created_at: this.timestamp,
    updated_at: this.timestamp,
  })
  return getScheduleByName.call(this, schedule.name)
}

/**
 * Updates a schedule by name
 *
 * @returns True if the schedule exists
 */
export async function updateSchedule(
  this: DatabaseService,
  name: string,
  updates: ScheduleUpdate,
): Promise<boolean> {
  const data: Record<string, string | boolean | null> = {
    updated_at: this.timestamp,
  }
  if (updates.config !== undefined) data.config = JSON.stringify(updates.config)
  if (updates.enabled !== undefined) data.enabled = updates.enabled
  if (updates.last_run !== undefined)
    data.last_run = updates.last_run ? JSON.stringify(updates.last_run) : null
  if (updates.next_run !== undefined)
    data.next_run = updates.next_run ? JSON.stringify(updates.next_run) : null

  const updated = await this.knex('schedules').where({ name }).update(data)
  return updated > 0
}

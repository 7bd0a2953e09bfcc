import type {
  DbSchedule,
  ScheduleUpdate,
} from '@root/types/scheduler.types.js'

declare module '../../database.service.js' {
  interface DatabaseService {
    // SCHEDULER METHODS
    /**
     * Retrieves a specific schedule by name
     * @param name - Name of the schedule to retrieve
     * @returns Promise resolving to the schedule if found, null otherwise
     */
    getScheduleByName(name: string): Promise<DbSchedule | null>

    /**
     * Creates a new schedule
     * @param schedule - Schedule data excluding auto-generated fields
     * @returns Promise resolving to the stored schedule
     */
    createSchedule(
      schedule: Omit<DbSchedule, 'id' | 'created_at' | 'updated_at'>,
    ): Promise<DbSchedule | null>

    /**
     * Updates an existing schedule
     * @param name - Name of the schedule to update
     * @param updates - Fields to change
     * @returns Promise resolving to true if the schedule exists
     */
    updateSchedule(name: string, updates: ScheduleUpdate): Promise<boolean>
  }
}

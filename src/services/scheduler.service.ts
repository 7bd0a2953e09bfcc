/**
 * Scheduler Service
 *
 * Runs the application's periodic jobs on toad-scheduler and persists each
 * job's schedule, last run and estimated next run in the database.
 *
 * Responsible for:
 * - Registering interval jobs with their handlers
 * - Persisting job schedules in the database
 * - Recording job outcomes without letting a failed run stop the schedule
 *
 * @example
 * await fastify.scheduler.scheduleJob('my-job', { seconds: 60 }, async () => {
 *   // Job implementation
 * })
 */
import type { IntervalConfig } from '@root/types/scheduler.types.js'
import { errorMessage } from '@root/types/errors.js'
import { createServiceLogger } from '@utils/logger.js'
import type { FastifyBaseLogger, FastifyInstance } from 'fastify'
import { AsyncTask, SimpleIntervalJob, ToadScheduler } from 'toad-scheduler'

/** Handler function type for scheduled jobs */
export type JobHandler = (jobName: string) => Promise<void>

/**
 * Adds an interval to a date
 */
export function calculateNextIntervalRun(
  config: IntervalConfig,
  from: Date = new Date(),
): Date {
  const nextRun = new Date(from)
  if (config.days) nextRun.setDate(nextRun.getDate() + config.days)
  if (config.hours) nextRun.setHours(nextRun.getHours() + config.hours)
  if (config.minutes) nextRun.setMinutes(nextRun.getMinutes() + config.minutes)
  if (config.seconds) nextRun.setSeconds(nextRun.getSeconds() + config.seconds)
  return nextRun
}

export class SchedulerService {
  private readonly log: FastifyBaseLogger

  /** The scheduler instance */
  private readonly scheduler: ToadScheduler

  /** Handlers of the jobs currently scheduled */
  private readonly jobs = new Map<string, JobHandler>()

  /**
   * Creates a new SchedulerService instance
   *
   * @param baseLog - Fastify logger instance
   * @param fastify - Fastify instance for accessing the database
   */
  constructor(
    readonly baseLog: FastifyBaseLogger,
    private readonly fastify: FastifyInstance,
  ) {
    this.log = createServiceLogger(baseLog, 'SCHEDULER')
    this.scheduler = new ToadScheduler()
  }

  private async recordRun(name: string, config: IntervalConfig, error?: unknown) {
    await this.fastify.db.updateSchedule(name, {
      last_run: {
        time: new Date().toISOString(),
        status: error === undefined ? 'completed' : 'failed',
        ...(error === undefined ? {} : { error: errorMessage(error) }),
      },
      next_run: {
        time: calculateNextIntervalRun(config).toISOString(),
        status: 'pending',
        estimated: true,
      },
    })
  }

  private createJob(
    name: string,
    config: IntervalConfig,
    handler: JobHandler,
  ): SimpleIntervalJob {
    const task = new AsyncTask(
      `${name}-task`,
      async () => {
        this.log.debug(`Running scheduled job: ${name}`)
        try {
          await handler(name)
          await this.recordRun(name, config)
          this.log.debug(`Job ${name} completed successfully`)
        } catch (error) {
          this.log.error({ error }, `Error in job ${name}`)
          await this.recordRun(name, config, error)
        }
      },
      (error) => {
        this.log.error({ error }, `Job task error for ${name}`)
      },
    )

    return new SimpleIntervalJob(
      {
        ...config,
        runImmediately: config.runImmediately ?? false,
      },
      task,
      {
        id: name,
        preventOverrun: true,
      },
    )
  }

  /**
   * Stores the schedule for a job and starts it, replacing any job already
   * running under the same name. A schedule disabled in the database is
   * registered but not started.
   *
   * @param name - Unique name for the job
   * @param config - Interval between runs
   * @param handler - Function to execute when the job runs
   * @returns Promise resolving to true if the job is running
   */
  async scheduleJob(
    name: string,
    config: IntervalConfig,
    handler: JobHandler,
  ): Promise<boolean> {
    const nextRun = {
      time: calculateNextIntervalRun(config).toISOString(),
      status: 'pending' as const,
      estimated: true,
    }

    let schedule = await this.fastify.db.getScheduleByName(name)
    if (schedule) {
      await this.fastify.db.updateSchedule(name, { config, next_run: nextRun })
    } else {
      schedule = await this.fastify.db.createSchedule({
        name,
        type: 'interval',
        config,
        enabled: true,
        last_run: null,
        next_run: nextRun,
      })
      this.log.info(`Created schedule for job ${name}`)
    }

    if (this.jobs.has(name)) {
      this.scheduler.removeById(name)
      this.jobs.delete(name)
    }

    if (!schedule?.enabled) {
      this.log.info(`Job ${name} is disabled`)
      return false
    }

    this.scheduler.addSimpleIntervalJob(this.createJob(name, config, handler))
    this.jobs.set(name, handler)
    this.log.info({ config }, `Job ${name} scheduled successfully`)
    return true
  }

  /**
   * Remove a job from the scheduler
   *
   * @param name - Name of the job to remove
   * @returns True if the job was scheduled
   */
  unscheduleJob(name: string): boolean {
    if (!this.jobs.has(name)) {
      return false
    }
    this.scheduler.removeById(name)
    this.jobs.delete(name)
    this.log.info(`Job ${name} unscheduled`)
    return true
  }

  /**
   * Get a list of all scheduled job names
   */
  getActiveJobs(): string[] {
    return Array.from(this.jobs.keys())
  }

  /**
   * Stop the scheduler and all running jobs
   *
   * Should be called during application shutdown.
   */
  stop(): void {
    this.log.info('Stopping all scheduled jobs')
    this.scheduler.stop()
    this.jobs.clear()
  }
}

/**
 * Task Orchestrator
 *
 * Generic runner that discovers and executes tasks from all grid sources
 * based on schedule names. Source-agnostic.
 */

import { glob } from 'glob'
import path from 'path'
import { fileURLToPath } from 'url'

const __dirname = path.dirname(fileURLToPath(import.meta.url))

export type Schedule = 'polling' | 'daily'

export interface TaskOutcome {
  success: boolean
  itemsProcessed: number
  detail?: unknown
}

export interface Task {
  id: string
  schedule: Schedule
  description: string
  enabled?: boolean | (() => boolean)
  run: () => Promise<TaskOutcome>
}

export interface TaskResult {
  taskId: string
  success: boolean
  itemsProcessed: number
  duration: number
  detail?: unknown
  error?: string
  skipped?: boolean
  reason?: string
}

export interface ScheduleResult {
  schedule: string
  tasksRun: number
  itemsProcessed: number
  failures: number
  duration: number
  tasks: TaskResult[]
}

export interface TaskMetadata {
  id: string
  schedule: string
  description: string
  enabled: boolean
}

function isTask(value: unknown): value is Task {
  if (typeof value !== 'object' || value === null) return false
  return 'id' in value && typeof value.id === 'string'
    && 'schedule' in value && typeof value.schedule === 'string'
    && 'run' in value && typeof value.run === 'function'
}

function isEnabled(task: Task): boolean {
  if (task.enabled === undefined) return true
  return typeof task.enabled === 'function' ? task.enabled() : task.enabled
}

/**
 * Load all task definitions from all sources
 */
async function loadAllTasks(): Promise<Task[]> {
  const tasks: Task[] = []

  const sourcesDir = path.join(__dirname, '../sources')
  const taskFiles = await glob('*/tasks.{ts,js}', { cwd: sourcesDir, absolute: true })

  for (const taskFile of taskFiles) {
    try {
      const module: { default?: unknown } = await import(taskFile)
      const exported = Array.isArray(module.default) ? module.default : []
      tasks.push(...exported.filter(isTask))
    } catch (error) {
      console.error(`Failed to load tasks from ${taskFile}:`, error instanceof Error ? error.message : String(error))
    }
  }

  return tasks
}

/**
 * Execute a single task; a throwing task becomes a failed result
 * @private
 */
async function executeTask(task: Task): Promise<TaskResult> {
  const startTime = Date.now()

  try {
    const outcome = await task.run()
    return {
      taskId: task.id,
      success: outcome.success,
      itemsProcessed: outcome.itemsProcessed,
      detail: outcome.detail,
      duration: Date.now() - startTime
    }
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    console.error(`\n❌ Task ${task.id} failed:`, message)
    return {
      taskId: task.id,
      success: false,
      itemsProcessed: 0,
      error: message,
      duration: Date.now() - startTime
    }
  }
}

/**
 * Run all tasks matching a specific schedule
 * @param schedule - Schedule name ('polling', 'daily')
 * @returns Execution summary
 */
export async function runSchedule(schedule: string): Promise<ScheduleResult> {
  console.log(`\n🚀 Running schedule: ${schedule}\n`)

  const startTime = Date.now()
  const allTasks = await loadAllTasks()

  const matchingTasks = allTasks.filter(task => {
    if (task.schedule !== schedule) return false
    if (!isEnabled(task)) {
      console.log(`⏭️  Skipping disabled task: ${task.id}`)
      return false
    }
    return true
  })

  if (matchingTasks.length === 0) {
    console.log(`⚠️  No tasks found for schedule: ${schedule}`)
    return {
      schedule,
      tasksRun: 0,
      itemsProcessed: 0,
      failures: 0,
      duration: Date.now() - startTime,
      tasks: []
    }
  }

  console.log(`Found ${matchingTasks.length} task(s) to run:\n`)
  matchingTasks.forEach(task => {
    console.log(`  - ${task.id}: ${task.description}`)
  })
  console.log()

  const taskResults: TaskResult[] = []
  for (const task of matchingTasks) {
    taskResults.push(await executeTask(task))
  }

  const itemsProcessed = taskResults.reduce((sum, r) => sum + r.itemsProcessed, 0)
  const failures = taskResults.filter(r => !r.success).length
  const duration = Date.now() - startTime

  console.log(`\n✨ Schedule complete in ${(duration / 1000).toFixed(1)}s`)
  console.log(`   Tasks run: ${matchingTasks.length} (${failures} failed)`)
  console.log(`   Items processed: ${itemsProcessed}`)

  return {
    schedule,
    tasksRun: matchingTasks.length,
    itemsProcessed,
    failures,
    duration,
    tasks: taskResults
  }
}

/**
 * Run a specific task by ID
 * @param taskId - Task identifier (e.g., 'playtomic:grid')
 */
export async function runTask(taskId: string): Promise<TaskResult> {
  console.log(`\n🎯 Running task: ${taskId}\n`)

  const allTasks = await loadAllTasks()
  const task = allTasks.find(t => t.id === taskId)

  if (!task) {
    throw new Error(`Task not found: ${taskId}`)
  }

  if (!isEnabled(task)) {
    console.log(`⏭️  Task is disabled: ${task.id}`)
    return {
      taskId: task.id,
      success: false,
      itemsProcessed: 0,
      skipped: true,
      reason: 'Task is disabled via config',
      duration: 0
    }
  }

  return executeTask(task)
}

/**
 * Re-run a schedule forever on a fixed interval. A failed cycle is logged
 * and the next one runs on time.
 */
export async function runLoop(schedule: string, intervalMs: number): Promise<never> {
  for (let cycle = 1; ; cycle++) {
    console.log(`🔁 Starting cycle ${cycle} (${schedule})...`)

    try {
      await runSchedule(schedule)
    } catch (error) {
      console.error(`❌ Cycle ${cycle} failed:`, error instanceof Error ? error.message : String(error))
    }

    console.log(`✅ Cycle ${cycle} complete. Sleeping for ${(intervalMs / 3600000).toFixed(1)} hours...\n`)
    await new Promise(resolve => setTimeout(resolve, intervalMs))
  }
}

/**
 * List all available tasks
 */
export async function listTasks(): Promise<TaskMetadata[]> {
  const allTasks = await loadAllTasks()

  return allTasks.map(task => ({
    id: task.id,
    schedule: task.schedule,
    description: task.description,
    enabled: isEnabled(task)
  }))
}

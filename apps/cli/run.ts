#!/usr/bin/env node
/**
 * CLI runner
 *
 * Usage:
 *   tsx apps/cli/run.ts schedule:polling
 *   tsx apps/cli/run.ts schedule:daily
 *   tsx apps/cli/run.ts task playtomic:grid
 *   tsx apps/cli/run.ts loop [hours]
 *   tsx apps/cli/run.ts list
 */

import 'dotenv/config'
import config from '../../config.js'
import { listTasks, runLoop, runSchedule, runTask } from '../../packages/orchestrator/runner.js'

const command = process.argv[2]
const arg = process.argv[3]

function usage(): void {
  console.error('Usage: tsx apps/cli/run.ts <command> [args]')
  console.error('')
  console.error('Commands:')
  console.error('  schedule:polling - Run polling tasks (grid ingestion)')
  console.error('  schedule:daily   - Run daily tasks (venue listing, proxy probe)')
  console.error('  task <id>        - Run specific task by ID')
  console.error('  loop [hours]     - Run schedule:polling forever, sleeping between cycles')
  console.error('  list             - List all available tasks')
}

async function main(): Promise<void> {
  if (!command) {
    usage()
    process.exit(1)
  }

  if (command.startsWith('schedule:')) {
    const result = await runSchedule(command.slice('schedule:'.length))
    if (result.failures > 0) process.exitCode = 1
  }

  else if (command === 'task') {
    if (!arg) {
      console.error('Error: task ID required')
      console.error('Usage: tsx apps/cli/run.ts task <task-id>')
      process.exit(1)
    }
    const result = await runTask(arg)
    if (!result.success) process.exitCode = 1
  }

  else if (command === 'loop') {
    const hours = arg ? parseFloat(arg) : config.loop.intervalHours
    if (!Number.isFinite(hours) || hours <= 0) {
      console.error(`Invalid interval: ${arg}`)
      process.exit(1)
    }
    await runLoop('polling', hours * 60 * 60 * 1000)
  }

  else if (command === 'list') {
    const tasks = await listTasks()

    console.log('\n📋 Available tasks:\n')

    tasks.forEach(task => {
      console.log(`  ${task.id}${task.enabled ? '' : ' (disabled)'}`)
      console.log(`    Schedule: ${task.schedule}`)
      console.log(`    ${task.description}`)
      console.log()
    })

    console.log(`Total: ${tasks.length} task(s)`)
  }

  else {
    console.error(`Unknown command: ${command}`)
    usage()
    process.exit(1)
  }
}

main().catch((error: unknown) => {
  console.error('\n❌ Error:', error instanceof Error ? error.message : String(error))
  if (error instanceof Error) console.error(error.stack)
  process.exit(1)
})

import path from 'path'
import { loadConfig, getConnections, getConnectionById, toConnectionDetails } from './lib/config'
import { createQueryExecutor } from './lib/db'
import { runShell } from './repl'

// Parse command line arguments
function parseArgs(argv: string[]): { config?: string; connection?: string } {
  const result: { config?: string; connection?: string } = {}
  for (let i = 0; i < argv.length; i++) {
    if (argv[i] === '--config' && argv[i + 1]) {
      result.config = argv[i + 1]
    } else if (argv[i] === '--connection' && argv[i + 1]) {
      result.connection = argv[i + 1]
    }
  }
  return result
}

async function start() {
  const args = parseArgs(process.argv.slice(2))
  if (!args.config) {
    console.error('Usage: sqlshell --config <file> [--connection <id>]')
    process.exit(1)
  }

  try {
    loadConfig(args.config)
    console.log(`✓ Loaded config from: ${path.resolve(args.config)}`)
  } catch (error) {
    console.error('Failed to load config:', error instanceof Error ? error.message : error)
    process.exit(1)
  }

  const conn = args.connection ? getConnectionById(args.connection) : getConnections()[0]
  if (!conn) {
    console.error(args.connection ? `Unknown connection: ${args.connection}` : 'No connections configured')
    process.exit(1)
  }

  console.log(`Connecting to ${conn.name} (${conn.host}:${conn.port}/${conn.database})`)
  await runShell(createQueryExecutor(toConnectionDetails(conn)))
}

start().catch((error: unknown) => {
  console.error(error instanceof Error ? error.stack ?? error.message : error)
  process.exit(1)
})

import { parse } from 'smol-toml'
import { readFileSync, existsSync } from 'fs'
import { isSslMode, SSL_MODES, type ConnectionDetails, type SslMode } from './db'

export interface ConnectionConfig {
  id: string
  name: string
  host: string
  port: number
  database: string
  username: string
  password?: string
  ssl_mode?: SslMode
  lock_timeout?: string
  statement_timeout?: string
}

export interface Config {
  connections: ConnectionConfig[]
}

const DEFAULT_CONFIG: Config = { connections: [] }

let loadedConfig: Config = { ...DEFAULT_CONFIG }

export function parseConfig(content: string): Config {
  const parsed = parse(content) as { connections?: unknown[] }

  if (parsed.connections !== undefined && !Array.isArray(parsed.connections)) {
    throw new Error('connections must be an array of tables ([[connections]])')
  }

  // Parse and validate connections
  const connections: ConnectionConfig[] = []
  const seenIds = new Set<string>()

  for (const conn of parsed.connections || []) {
    const c = conn as Record<string, unknown>

    // Validate required fields
    if (!c.id || typeof c.id !== 'string') {
      throw new Error('Connection missing required field: id')
    }
    if (!c.name || typeof c.name !== 'string') {
      throw new Error(`Connection ${c.id} missing required field: name`)
    }
    if (!c.host || typeof c.host !== 'string') {
      throw new Error(`Connection ${c.id} missing required field: host`)
    }
    if (!c.database || typeof c.database !== 'string') {
      throw new Error(`Connection ${c.id} missing required field: database`)
    }
    if (!c.username || typeof c.username !== 'string') {
      throw new Error(`Connection ${c.id} missing required field: username`)
    }

    // Check unique ID
    if (seenIds.has(c.id)) {
      throw new Error(`Duplicate connection id: ${c.id}`)
    }
    seenIds.add(c.id)

    if (c.port !== undefined && (typeof c.port !== 'number' || !Number.isInteger(c.port) || c.port <= 0)) {
      throw new Error(`Connection ${c.id} has invalid port: ${String(c.port)}`)
    }

    // Validate ssl_mode if provided
    const rawSslMode = typeof c.ssl_mode === 'string' && c.ssl_mode ? c.ssl_mode : 'prefer'
    if (!isSslMode(rawSslMode)) {
      throw new Error(`Connection ${c.id} has invalid ssl_mode: ${rawSslMode} (expected one of ${SSL_MODES.join(', ')})`)
    }
    const sslMode: SslMode = rawSslMode

    connections.push({
      id: c.id,
      name: c.name,
      host: c.host,
      port: typeof c.port === 'number' ? c.port : 5432,
      database: c.database,
      username: c.username,
      password: typeof c.password === 'string' ? c.password : undefined,
      ssl_mode: sslMode,
      lock_timeout: typeof c.lock_timeout === 'string' ? c.lock_timeout : undefined,
      statement_timeout: typeof c.statement_timeout === 'string' ? c.statement_timeout : undefined,
    })
  }

  return { connections }
}

export function loadConfig(configPath: string): void {
  if (!existsSync(configPath)) {
    throw new Error(`Config file not found: ${configPath}`)
  }

  const content = readFileSync(configPath, 'utf-8')
  loadedConfig = parseConfig(content)
}

export function getConnections(): ConnectionConfig[] {
  return loadedConfig.connections
}

export function getConnectionById(id: string): ConnectionConfig | undefined {
  return loadedConfig.connections.find(c => c.id === id)
}

export function toConnectionDetails(conn: ConnectionConfig): ConnectionDetails {
  return {
    host: conn.host,
    port: conn.port,
    database: conn.database,
    username: conn.username,
    password: conn.password,
    sslMode: conn.ssl_mode || 'prefer',
    lockTimeout: conn.lock_timeout,
    statementTimeout: conn.statement_timeout,
  }
}

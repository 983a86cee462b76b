import postgres from "postgres";
import { QueryExecutionError, type QueryExecutor, type QueryRow } from "../../src/lib/sql/autocomplete";

export type SslMode = "disable" | "prefer" | "require" | "verify-full";

export const SSL_MODES: readonly SslMode[] = ["disable", "prefer", "require", "verify-full"];

export function isSslMode(value: string): value is SslMode {
  return SSL_MODES.some((mode) => mode === value);
}

export interface ConnectionDetails {
  host: string;
  port: number;
  database: string;
  username: string;
  password: string | undefined;
  sslMode: SslMode;
  lockTimeout?: string;
  statementTimeout?: string;
}

export interface ClosableQueryExecutor extends QueryExecutor {
  close(): Promise<void>;
}

// Driver error codes for connections that failed or dropped
const CONNECTION_ERROR_CODES = new Set([
  "ECONNREFUSED",
  "ECONNRESET",
  "ENOTFOUND",
  "ETIMEDOUT",
  "EHOSTUNREACH",
  "CONNECT_TIMEOUT",
  "CONNECTION_CLOSED",
  "CONNECTION_ENDED",
  "CONNECTION_DESTROYED",
]);

export const APP_NAME = "sqlshell";

export function createClient(details: ConnectionDetails) {
  return postgres({
    host: details.host,
    port: details.port,
    database: details.database,
    username: details.username,
    password: details.password,
    ssl: details.sslMode === "disable" ? false : details.sslMode,
    connect_timeout: 10,
    max: 1,
    onnotice: () => {},
    connection: {
      application_name: APP_NAME,
      ...(details.lockTimeout ? { lock_timeout: details.lockTimeout } : {}),
      ...(details.statementTimeout ? { statement_timeout: details.statementTimeout } : {}),
    },
  });
}

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}

/**
 * Map a driver error to QueryExecutionError when it is a server-side or
 * connectivity failure. Returns the original error otherwise.
 */
export function toQueryExecutionError(error: unknown): unknown {
  if (error instanceof postgres.PostgresError) {
    return new QueryExecutionError(error.message, { cause: error });
  }
  const code = errorCode(error);
  if (code && CONNECTION_ERROR_CODES.has(code) && error instanceof Error) {
    return new QueryExecutionError(error.message, { cause: error });
  }
  return error;
}

export function createQueryExecutor(details: ConnectionDetails): ClosableQueryExecutor {
  const client = createClient(details);

  return {
    async execute(statement: string): Promise<QueryRow[]> {
      try {
        const rows = await client.unsafe<QueryRow[]>(statement);
        return Array.from(rows);
      } catch (error) {
        throw toQueryExecutionError(error);
      }
    },
    async close(): Promise<void> {
      await client.end();
    },
  };
}

import readline from 'readline'
import type { Completer } from 'readline'
import {
  QueryExecutionError,
  SqlCompleter,
  extractLastWord,
  textBeforeCursor,
} from '../src/lib/sql/autocomplete'
import type { QueryExecutor, StaticKeywordLists } from '../src/lib/sql/autocomplete'
import type { ClosableQueryExecutor } from './lib/db'

const PRIMARY_PROMPT = 'sql> '
const CONTINUATION_PROMPT = '...> '
const EXIT_COMMANDS = ['.exit', '.quit']

/** Input the prompt holds at the moment TAB is pressed */
export interface PromptState {
  /** Earlier lines of a statement not yet terminated by ';' */
  buffer: string
  /** The whole current line, including text after the cursor */
  line: string
  /** Cursor position within `line` */
  cursor: number
}

/**
 * Complete against the full pending statement: buffered lines plus the
 * current line, with the cursor mapped into that text.
 */
export function completeAt(completer: SqlCompleter, state: PromptState): [string[], string] {
  const head = state.buffer ? `${state.buffer}\n` : ''
  const text = head + state.line
  const cursor = head.length + state.cursor
  const labels = Array.from(completer.complete(text, cursor), (c) => c.label)
  return [labels, extractLastWord(textBeforeCursor(text, cursor))]
}

/**
 * Adapt SqlCompleter to readline's completer signature. readline passes only
 * the line up to the cursor, so the state is read from the prompt instead.
 */
export function createLineCompleter(completer: SqlCompleter, readState: () => PromptState): Completer {
  return (): [string[], string] => completeAt(completer, readState())
}

/**
 * Append a line to the pending buffer. Returns the statement once the buffer
 * ends with a semicolon.
 */
export function appendLine(buffer: string, line: string): { buffer: string; statement: string | null } {
  const next = buffer ? `${buffer}\n${line}` : line
  const trimmed = next.trim()
  if (trimmed.endsWith(';')) {
    return { buffer: '', statement: trimmed }
  }
  return { buffer: next, statement: null }
}

export interface ReplOptions {
  completer: SqlCompleter
  executor: QueryExecutor
  input?: NodeJS.ReadableStream
  output?: NodeJS.WritableStream
}

export async function runStatement(executor: QueryExecutor, statement: string): Promise<void> {
  try {
    const rows = await executor.execute(statement)
    if (rows.length > 0) {
      console.table(rows)
    }
    console.log(`(${rows.length} row${rows.length === 1 ? '' : 's'})`)
  } catch (error) {
    if (error instanceof QueryExecutionError) {
      console.error(`Error: ${error.message}`)
      return
    }
    throw error
  }
}

/**
 * Run the interactive prompt until EOF or an exit command.
 */
export function startRepl(options: ReplOptions): Promise<void> {
  let buffer = ''

  const rl: readline.Interface = readline.createInterface({
    input: options.input ?? process.stdin,
    output: options.output ?? process.stdout,
    completer: createLineCompleter(options.completer, () => ({ buffer, line: rl.line, cursor: rl.cursor })),
  })

  return new Promise<void>((resolve, reject) => {
    let busy = Promise.resolve()

    rl.setPrompt(PRIMARY_PROMPT)
    rl.prompt()

    rl.on('line', (line) => {
      if (!buffer && EXIT_COMMANDS.includes(line.trim())) {
        rl.close()
        return
      }

      const result = appendLine(buffer, line)
      buffer = result.buffer
      const statement = result.statement
      if (statement === null) {
        rl.setPrompt(buffer ? CONTINUATION_PROMPT : PRIMARY_PROMPT)
        rl.prompt()
        return
      }

      rl.pause()
      busy = busy
        .then(() => runStatement(options.executor, statement))
        .then(() => {
          rl.setPrompt(PRIMARY_PROMPT)
          rl.resume()
          rl.prompt()
        })
        .catch((error: unknown) => {
          rl.close()
          reject(error)
        })
    })

    rl.on('close', () => {
      busy.then(resolve, reject)
    })
  })
}

export interface ShellOptions {
  input?: NodeJS.ReadableStream
  output?: NodeJS.WritableStream
  keywordLists?: StaticKeywordLists
}

/**
 * One interactive session: start the background schema load, run the prompt,
 * and close the executor however the session ends. A load failure other than
 * QueryExecutionError ends the session with that error.
 */
export async function runShell(executor: ClosableQueryExecutor, options: ShellOptions = {}): Promise<void> {
  const completer = new SqlCompleter(executor, { keywordLists: options.keywordLists })
  // loaded must be observed in the same tick it is created
  const session = Promise.all([
    completer.loaded,
    startRepl({ completer, executor, input: options.input, output: options.output }),
  ])

  try {
    await session
  } finally {
    await executor.close()
  }
}

import chalk, { Chalk, type ChalkInstance } from 'chalk'
import { errorCategory, formatErrorMessage } from '@pocket-agent/protocol'
import type {
  AnyCommandResult,
  ColumnColor,
  ColumnDef,
  CommandError,
  OutputOptions,
} from './types.js'

export const defaultOutputOptions: OutputOptions = {
  format: 'table',
  quiet: false,
  noHeaders: false,
  noColor: false,
}

const COLUMN_GAP = '  '

function painter(options: OutputOptions): ChalkInstance {
  return new Chalk({ level: options.noColor ? 0 : chalk.level })
}

function paint(ink: ChalkInstance, color: ColumnColor | undefined, text: string): string {
  switch (color) {
    case 'green':
      return ink.green(text)
    case 'yellow':
      return ink.yellow(text)
    case 'red':
      return ink.red(text)
    case 'cyan':
      return ink.cyan(text)
    case 'gray':
      return ink.gray(text)
    case undefined:
      return text
  }
}

export function formatCell(value: unknown): string {
  if (value === null || value === undefined) return '-'
  if (value instanceof Date) return value.toISOString()
  if (typeof value === 'object') return JSON.stringify(value)
  return String(value)
}

/** Pads to `width`, truncating with an ellipsis when the text does not fit. */
export function fitToWidth(text: string, width: number | undefined): string {
  if (width === undefined) return text
  if (text.length > width) {
    return width <= 1 ? text.slice(0, width) : `${text.slice(0, width - 1)}…`
  }
  return text.padEnd(width)
}

function renderRow<T>(item: T, columns: ColumnDef<T>[], ink: ChalkInstance): string {
  return columns
    .map((column) => {
      const value = item[column.field]
      const text = fitToWidth(formatCell(value), column.width)
      return paint(ink, column.color?.(value, item), text)
    })
    .join(COLUMN_GAP)
    .trimEnd()
}

function renderTable<T>(data: T[], columns: ColumnDef<T>[], options: OutputOptions): string {
  const ink = painter(options)
  const lines: string[] = []
  if (!options.noHeaders) {
    const header = columns
      .map((column) => fitToWidth(column.header, column.width))
      .join(COLUMN_GAP)
      .trimEnd()
    lines.push(ink.bold(header))
  }
  for (const item of data) {
    lines.push(renderRow(item, columns, ink))
  }
  return lines.join('\n')
}

export function render<T>(result: AnyCommandResult<T>, options: OutputOptions): string {
  const items = result.type === 'list' ? result.data : [result.data]

  if (options.format === 'json') {
    return JSON.stringify(result.data, null, 2)
  }
  if (options.quiet) {
    return items.map((item) => formatCell(item[result.schema.idField])).join('\n')
  }
  return renderTable(items, result.schema.columns, options)
}

export function isCommandError(value: unknown): value is CommandError {
  return (
    typeof value === 'object' &&
    value !== null &&
    'code' in value &&
    typeof value.code === 'string' &&
    'message' in value &&
    typeof value.message === 'string' &&
    !(value instanceof Error)
  )
}

export function toCommandError(error: unknown): CommandError {
  if (isCommandError(error)) {
    return error
  }
  return {
    code: errorCategory(error).toUpperCase(),
    message: formatErrorMessage(error),
  }
}

export function renderError(error: CommandError, options: OutputOptions): string {
  if (options.format === 'json') {
    return JSON.stringify({ error }, null, 2)
  }
  const ink = painter(options)
  const lines = [ink.red(error.message)]
  if (error.details) {
    lines.push(ink.gray(error.details))
  }
  return lines.join('\n')
}

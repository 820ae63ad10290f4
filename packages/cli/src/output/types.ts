/**
 * Output types shared by every command.
 *
 * Commands return a result describing what to show; the renderer decides
 * how based on the global output options.
 */

export type OutputFormat = 'table' | 'json'

export interface OutputOptions {
  format: OutputFormat
  /** Print only the id column, one value per line */
  quiet: boolean
  noHeaders: boolean
  noColor: boolean
}

export type ColumnColor = 'green' | 'yellow' | 'red' | 'cyan' | 'gray'

export interface ColumnDef<T> {
  header: string
  field: keyof T & string
  width?: number
  color?: (value: T[keyof T & string], item: T) => ColumnColor | undefined
}

export interface OutputSchema<T> {
  /** Field printed in quiet mode */
  idField: keyof T & string
  columns: ColumnDef<T>[]
}

export interface ListResult<T> {
  type: 'list'
  data: T[]
  schema: OutputSchema<T>
}

export interface SingleResult<T> {
  type: 'single'
  data: T
  schema: OutputSchema<T>
}

export type AnyCommandResult<T> = ListResult<T> | SingleResult<T>

/** Thrown by commands for failures that need no stack trace */
export interface CommandError {
  code: string
  message: string
  details?: string
}

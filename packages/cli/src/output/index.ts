export type {
  AnyCommandResult,
  ColumnColor,
  ColumnDef,
  CommandError,
  ListResult,
  OutputFormat,
  OutputOptions,
  OutputSchema,
  SingleResult,
} from './types.js'
export {
  defaultOutputOptions,
  fitToWidth,
  formatCell,
  isCommandError,
  render,
  renderError,
  toCommandError,
} from './render.js'
export {
  commandOptions,
  extractOutputOptions,
  withOutput,
  type CommandOptions,
} from './with-output.js'

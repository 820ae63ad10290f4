/**
 * Command wrapper for automatic output rendering.
 *
 * Wraps command handlers to render their results and report errors.
 */

import { Command } from 'commander'
import type { AnyCommandResult, CommandError, OutputOptions } from './types.js'
import { render, renderError, toCommandError, defaultOutputOptions } from './render.js'

/** Options that include output settings from global options */
export interface CommandOptions extends Partial<OutputOptions> {
  [key: string]: unknown
}

function normalizeFormat(raw: unknown): OutputOptions['format'] {
  const value = typeof raw === 'string' ? raw.trim().toLowerCase() : ''

  // "cli" reads as the human format
  if (value === 'cli') return 'table'

  if (value === 'table' || value === 'json') return value

  const error: CommandError = {
    code: 'INVALID_FORMAT',
    message: `Unsupported output format: ${String(raw)}`,
    details: 'Supported formats: table, json',
  }
  throw error
}

/** Extract output options from command options */
export function extractOutputOptions(options: CommandOptions): OutputOptions {
  return {
    format: options.json ? 'json' : normalizeFormat(options.format ?? defaultOutputOptions.format),
    quiet: options.quiet === true,
    noHeaders: options.headers === false, // --no-headers -> headers: false
    noColor: options.color === false, // --no-color -> color: false
  }
}

/** Global and local options of the command commander passes last. */
export function commandOptions(args: readonly unknown[]): CommandOptions {
  const command = args[args.length - 1]
  return command instanceof Command ? command.optsWithGlobals<CommandOptions>() : {}
}

/**
 * Wrap a command handler to render its result.
 *
 * The handler returns a CommandResult; the wrapper renders it to stdout in
 * the requested format. Errors are rendered to stderr and exit with code 1.
 */
export function withOutput<T, Args extends unknown[]>(
  handler: (...args: [...Args, CommandOptions, Command]) => Promise<AnyCommandResult<T>>
): (...args: [...Args, CommandOptions, Command]) => Promise<void> {
  return async (...args) => {
    let outputOptions = defaultOutputOptions
    try {
      outputOptions = extractOutputOptions(commandOptions(args))
      const result = await handler(...args)
      const output = render(result, outputOptions)

      if (output) {
        process.stdout.write(output + '\n')
      }
    } catch (error) {
      const commandError = toCommandError(error)
      process.stderr.write(renderError(commandError, outputOptions) + '\n')
      process.exit(1)
    }
  }
}

import type { Command } from 'commander'
import {
  AppServerError,
  RPC_METHOD_NOT_FOUND,
  pendingRequestTitle,
  type AppServerClient,
  type AppServerEvent,
  type ApprovalDecision,
  type PendingServerRequest,
} from '@pocket-agent/protocol'
import { connectToAppServer } from '../utils/client.js'
import {
  extractOutputOptions,
  type CommandOptions,
  type OutputSchema,
  type SingleResult,
} from '../output/index.js'

/** Result type for the run command */
export interface RunResult {
  threadId: string
  turnId: string
  status: string
  snippet: string
}

export const runSchema: OutputSchema<RunResult> = {
  idField: 'threadId',
  columns: [
    { header: 'THREAD', field: 'threadId', width: 38 },
    { header: 'TURN', field: 'turnId', width: 38 },
    {
      header: 'STATUS',
      field: 'status',
      width: 12,
      color: (value) => {
        if (value === 'completed') return 'green'
        if (value === 'interrupted' || value === 'cancelled') return 'yellow'
        if (value === 'failed') return 'red'
        return undefined
      },
    },
  ],
}

export interface RunOptions extends CommandOptions {
  url?: string
  thread?: string
  cwd?: string
  model?: string
  effort?: string
  approve?: boolean
}

export interface RunTurnParams {
  prompt: string
  /** Resume this thread instead of starting one */
  threadId?: string
  cwd: string
  model?: string
  effort?: string
  /** Accept approvals instead of declining them */
  approve: boolean
}

/** Where a running turn's output goes */
export interface RunSink {
  write(chunk: string): void
  notice(message: string): void
}

type TurnCompletedEvent = Extract<AppServerEvent, { type: 'turn_completed' }>

function decisionFor(approve: boolean): ApprovalDecision {
  return approve ? 'accept' : 'decline'
}

export async function answerServerRequest(
  client: AppServerClient,
  request: PendingServerRequest,
  approve: boolean
): Promise<string> {
  const { kind } = request
  switch (kind.type) {
    case 'command_approval': {
      const decision = decisionFor(approve)
      await client.respondCommandApproval(request, decision)
      return `${pendingRequestTitle(request)}: ${kind.command} -> ${decision}`
    }
    case 'file_change_approval': {
      const decision = decisionFor(approve)
      await client.respondFileChangeApproval(request, decision)
      return `${pendingRequestTitle(request)} -> ${decision}`
    }
    case 'user_input': {
      const answers: Record<string, string[]> = {}
      for (const question of kind.questions) {
        const first = question.options[0]
        answers[question.id] = approve && first ? [first.label] : []
      }
      await client.respondUserInput(request, answers)
      return `${pendingRequestTitle(request)}: answered ${kind.questions.length} question(s)`
    }
    case 'unknown':
      await client.respondError(request, {
        code: RPC_METHOD_NOT_FOUND,
        message: `Unsupported request: ${request.method}`,
      })
      return `Rejected ${request.method}`
  }
}

/**
 * Starts (or resumes) a thread, runs one turn on it and streams the
 * transcript to `sink` until the turn finishes. Approvals are answered
 * automatically.
 */
export async function runTurn(
  client: AppServerClient,
  params: RunTurnParams,
  sink: RunSink
): Promise<RunResult> {
  let threadId: string
  if (params.threadId) {
    threadId = params.threadId
    await client.threadResume(threadId)
  } else {
    threadId = await client.threadStart({
      cwd: params.cwd,
      approvalPolicy: 'on-request',
      model: params.model,
    })
  }

  let printed = client.getTranscript(threadId)
  let unsubscribe: () => void = () => {}

  const completion = new Promise<TurnCompletedEvent>(
    (resolve, reject) => {
      unsubscribe = client.subscribe((event) => {
        switch (event.type) {
          case 'transcript':
            if (event.threadId !== threadId) return
            if (event.transcript.startsWith(printed)) {
              sink.write(event.transcript.slice(printed.length))
            }
            printed = event.transcript
            return
          case 'server_request':
            if (event.request.threadId && event.request.threadId !== threadId) return
            void answerServerRequest(client, event.request, params.approve).then(
              (summary) => sink.notice(summary),
              reject
            )
            return
          case 'turn_completed':
            if (event.threadId === threadId) resolve(event)
            return
          case 'state':
            if (event.state === 'disconnected') {
              reject(new AppServerError({ type: 'not_connected' }))
            }
            return
          default:
            return
        }
      })
    }
  )

  try {
    const [turnId, completed] = await Promise.all([
      client.turnStart({
        threadId,
        text: params.prompt,
        model: params.model,
        effort: params.effort,
      }),
      completion,
    ])
    return {
      threadId,
      turnId: completed.turnId ?? turnId,
      status: completed.status,
      snippet: completed.snippet,
    }
  } finally {
    unsubscribe()
  }
}

export async function runRunCommand(
  prompt: string,
  options: RunOptions,
  command: Command
): Promise<SingleResult<RunResult>> {
  const streaming = extractOutputOptions(command.optsWithGlobals<CommandOptions>()).format !== 'json'
  const { client } = await connectToAppServer({ url: options.url })

  const sink: RunSink = {
    write: (chunk) => {
      if (streaming) process.stdout.write(chunk)
    },
    notice: (message) => {
      process.stderr.write(`[approval] ${message}\n`)
    },
  }

  try {
    const result = await runTurn(
      client,
      {
        prompt,
        threadId: options.thread,
        cwd: options.cwd ?? process.cwd(),
        model: options.model,
        effort: options.effort,
        approve: options.approve === true,
      },
      sink
    )
    if (streaming) process.stdout.write('\n')
    return { type: 'single', data: result, schema: runSchema }
  } finally {
    await client.disconnect()
  }
}

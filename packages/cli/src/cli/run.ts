import { writeFile } from "node:fs/promises"

import pc from "picocolors"

import { type ConversionConfig, convertFiles, type ReadText } from "../convert/pipeline"
import { formats } from "../formats"
import { readInputText } from "../lib/fs"
import { parseCliArgs, helpText } from "./args"
import { toConversionConfig } from "./config"
import { CLI_NAME } from "./constants"
import { createClackProgress, type Progress } from "./progress"
import { formatError } from "./report"

export interface OutputStream {
  write(chunk: string): unknown
}

export interface CliIo {
  stdout: OutputStream
  stderr: OutputStream
  readText: ReadText
  colors: boolean
  progress: () => Progress
}

export function defaultCliIo(): CliIo {
  return {
    stdout: process.stdout,
    stderr: process.stderr,
    readText: readInputText,
    colors: Boolean(process.stderr.isTTY) && pc.isColorSupported,
    progress: createClackProgress,
  }
}

/** Runs one conversion and returns the process exit code. */
export async function runCli(argv: string[], io: CliIo = defaultCliIo()): Promise<number> {
  try {
    const args = parseCliArgs(argv)
    if (args.help) {
      io.stdout.write(`${helpText()}\n`)
      return 0
    }

    const config = toConversionConfig(args)
    if (config.output) {
      await convertToFile(config, config.output, io)
      return 0
    }

    const result = await convertFiles(config, io.readText)
    io.stdout.write(result.document)
    return 0
  } catch (error) {
    io.stderr.write(`${formatError(error, io.colors)}\n`)
    return 1
  }
}

async function convertToFile(config: ConversionConfig, output: string, io: CliIo): Promise<void> {
  const progress = io.progress()
  progress.start(`${CLI_NAME} - ${formats[config.from].label} to ${formats[config.to].label}`)

  const result = await convertFiles(config, io.readText)
  for (const input of result.inputs) {
    progress.info(`Read ${input.messageCount} messages from ${input.path}`)
  }
  if (config.sort) {
    progress.info("Sorted messages from oldest to newest")
  }

  await writeFile(output, result.document, "utf8")
  progress.success(`Wrote ${result.messageCount} messages to ${output}`)
  progress.done("Done")
}

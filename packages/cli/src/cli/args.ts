import { type FormatId, parseFormatId } from "../formats"
import { UsageError } from "../lib/errors"
import { STDIN_PATH } from "../lib/fs"
import { CLI_NAME } from "./constants"

export interface CliArgs {
  from?: FormatId
  to?: FormatId
  phone?: string
  inputs: string[]
  output?: string
  sort: boolean
  normalize: boolean
  help: boolean
}

interface LongOption {
  name: string
  value?: string
}

export function parseCliArgs(args: string[]): CliArgs {
  const parsed: CliArgs = {
    inputs: [],
    sort: false,
    normalize: false,
    help: false,
  }

  for (let index = 0; index < args.length; index += 1) {
    const arg = args[index]
    if (typeof arg !== "string") {
      continue
    }

    if (arg === "--help" || arg === "-h") {
      parsed.help = true
      continue
    }

    if (arg === "--sort") {
      parsed.sort = true
      continue
    }

    if (arg === "--norm" || arg === "--normalize") {
      parsed.normalize = true
      continue
    }

    if (arg.startsWith("--")) {
      const option = parseLongOption(arg)
      switch (option.name) {
        case "from": {
          parsed.from = parseFormatId(requireTrimmedValue(args, option, index, "--from"))
          index = advanceIndex(index, option)
          continue
        }
        case "to": {
          parsed.to = parseFormatId(requireTrimmedValue(args, option, index, "--to"))
          index = advanceIndex(index, option)
          continue
        }
        case "phone": {
          parsed.phone = requireTrimmedValue(args, option, index, "--phone")
          index = advanceIndex(index, option)
          continue
        }
        case "output": {
          parsed.output = requireTrimmedValue(args, option, index, "--output")
          index = advanceIndex(index, option)
          continue
        }
        case "input": {
          if (option.value !== undefined) {
            parsed.inputs.push(requireTrimmedValue(args, option, index, "--input"))
            continue
          }

          const values = collectValues(args, index + 1)
          if (values.length === 0) {
            throw new UsageError("Missing value for --input")
          }
          parsed.inputs.push(...values)
          index += values.length
          continue
        }
        default:
          throw new UsageError(`Unknown option '${arg}'. Run '${CLI_NAME} --help' for available flags.`)
      }
    }

    if (arg.startsWith("-") && arg !== STDIN_PATH) {
      throw new UsageError(`Unknown option '${arg}'. Run '${CLI_NAME} --help' for available flags.`)
    }

    throw new UsageError(`Unexpected argument '${arg}'. Input files follow --input.`)
  }

  return parsed
}

export function helpText(): string {
  return [
    "msgport - convert SMS/MMS backups between Windows 10 Mobile and Android",
    "",
    "Usage:",
    `  ${CLI_NAME} --from <format> --to <format> --input <file>... [flags]`,
    "",
    "Formats:",
    "  win10     Windows 10 Mobile message export (ArrayOfMessage XML)",
    "  android   SMS Backup & Restore XML",
    "  json      msgport intermediate JSON",
    "",
    "Flags:",
    "  --from <format>          Format of every input file",
    "  --to <format>            Format of the output document",
    "  --input <file>...        One or more input files, concatenated in order ('-' reads stdin)",
    "  --phone <number>         Your phone number; required for outgoing MMS when writing Android",
    "  --sort                   Sort messages from oldest to newest (stable)",
    "  --norm, --normalize      Reduce phone numbers to their last ten digits",
    "  --output <file>          Write to a file instead of stdout",
    "  -h, --help               Show help",
    "",
    "Examples:",
    `  ${CLI_NAME} --from win10 --to android --phone "+15550100000" --input win10.msg > android.xml`,
    `  ${CLI_NAME} --from android --to win10 --input 2019.xml 2020.xml --sort --output merged.msg`,
    `  ${CLI_NAME} --from win10 --to json --input win10.msg`,
  ].join("\n")
}

function collectValues(args: string[], start: number): string[] {
  const values: string[] = []
  for (let index = start; index < args.length; index += 1) {
    const value = args[index]
    if (typeof value !== "string" || (value.startsWith("-") && value !== STDIN_PATH)) {
      break
    }

    const trimmed = value.trim()
    if (trimmed.length === 0) {
      throw new UsageError("Empty value for --input")
    }
    values.push(trimmed)
  }

  return values
}

function parseLongOption(arg: string): LongOption {
  const equalsIndex = arg.indexOf("=")
  if (equalsIndex === -1) {
    return {
      name: arg.slice(2),
    }
  }

  return {
    name: arg.slice(2, equalsIndex),
    value: arg.slice(equalsIndex + 1),
  }
}

function requireValue(args: string[], option: LongOption, index: number, flagName: string): string {
  if (typeof option.value === "string") {
    return option.value
  }

  const next = args[index + 1]
  if (typeof next !== "string") {
    throw new UsageError(`Missing value for ${flagName}`)
  }

  return next
}

function requireTrimmedValue(args: string[], option: LongOption, index: number, flagName: string): string {
  const value = requireValue(args, option, index, flagName).trim()
  if (value.length === 0) {
    throw new UsageError(`Empty value for ${flagName}`)
  }

  return value
}

function advanceIndex(index: number, option: LongOption): number {
  return option.value === undefined ? index + 1 : index
}

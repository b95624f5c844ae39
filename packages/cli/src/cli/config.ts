import type { ConversionConfig } from "../convert/pipeline"
import { UsageError } from "../lib/errors"
import type { CliArgs } from "./args"
import { CLI_NAME, DEFAULT_NORMALIZE, DEFAULT_SORT } from "./constants"

export function toConversionConfig(args: CliArgs): ConversionConfig {
  if (!args.from) {
    throw new UsageError(`Missing --from. Run '${CLI_NAME} --help' for available formats.`)
  }

  if (!args.to) {
    throw new UsageError(`Missing --to. Run '${CLI_NAME} --help' for available formats.`)
  }

  if (args.inputs.length === 0) {
    throw new UsageError("Missing --input. Pass at least one input file.")
  }

  const config: ConversionConfig = {
    from: args.from,
    to: args.to,
    inputs: [...args.inputs],
    sort: args.sort || DEFAULT_SORT,
    normalize: args.normalize || DEFAULT_NORMALIZE,
  }

  if (args.phone) {
    config.phone = args.phone
  }

  if (args.output) {
    config.output = args.output
  }

  return config
}

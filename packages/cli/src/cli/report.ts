import pc from "picocolors"

import { errorMessage, MsgportError } from "../lib/errors"

export function formatError(error: unknown, useColor: boolean): string {
  const colors = pc.createColors(useColor)
  const prefix = error instanceof MsgportError && error.code === "USAGE" ? "usage error" : "error"
  return `${colors.red(prefix)}: ${errorMessage(error)}`
}

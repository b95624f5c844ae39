import { readFile, stat } from "node:fs/promises"
import { text } from "node:stream/consumers"

export const STDIN_PATH = "-"

export async function isFilePath(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isFile()
  } catch {
    return false
  }
}

export async function readInputText(path: string): Promise<string> {
  if (path === STDIN_PATH) {
    return text(process.stdin)
  }

  if (!(await isFilePath(path))) {
    throw new Error(`Input file not found: '${path}'`)
  }

  return readFile(path, "utf8")
}

import { readFile } from "node:fs/promises"
import { fileURLToPath } from "node:url"

export function fixturePath(name: string): string {
  return fileURLToPath(new URL(`./fixtures/${name}`, import.meta.url))
}

export function readFixture(name: string): Promise<string> {
  return readFile(fixturePath(name), "utf8")
}

import { intro, log, outro } from "@clack/prompts"

/** Narration shown while converting to an output file; stdout stays untouched otherwise. */
export interface Progress {
  start(title: string): void
  info(message: string): void
  success(message: string): void
  done(message: string): void
}

export function createClackProgress(): Progress {
  return {
    start: (title) => intro(title),
    info: (message) => log.info(message),
    success: (message) => log.success(message),
    done: (message) => outro(message),
  }
}

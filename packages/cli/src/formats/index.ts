import { UnsupportedFormatError } from "../lib/errors"
import type { MessageFormat } from "../types"
import { readAndroid, writeAndroid } from "./android"
import { readJson, writeJson } from "./json"
import { readWin10, writeWin10 } from "./win10"

export const formats = {
  win10: { label: "Windows 10 Mobile", read: readWin10, write: writeWin10 },
  android: { label: "Android (SMS Backup & Restore)", read: readAndroid, write: writeAndroid },
  json: { label: "msgport JSON", read: readJson, write: writeJson },
} as const satisfies Record<string, MessageFormat>

export type FormatId = keyof typeof formats

export const FORMAT_IDS: readonly FormatId[] = ["win10", "android", "json"]

export function isFormatId(value: string): value is FormatId {
  return FORMAT_IDS.some((id) => id === value)
}

export function parseFormatId(value: string): FormatId {
  const normalized = value.trim().toLowerCase()
  if (!isFormatId(normalized)) {
    throw new UnsupportedFormatError(value, FORMAT_IDS)
  }

  return normalized
}

export function resolveFormat(id: FormatId): MessageFormat {
  return formats[id]
}

import path from 'path'

/** Characters no mainstream filesystem accepts in a name, plus ASCII control characters. */
const INVALID_FILENAME_CHARS = /[<>:"/\\|?*\x00-\x1f]/g

export const MAX_FILENAME_LENGTH = 255
export const FALLBACK_FILENAME = 'converted_file'

/**
 * Sanitize a single filename (no directory part) for use as an output name.
 * - Replaces invalid characters with underscores
 * - Trims leading/trailing whitespace and dots
 * - Returns FALLBACK_FILENAME if the result would be empty
 * - Truncates to MAX_FILENAME_LENGTH, keeping the extension
 */
export function sanitizeFilename(filename: string): string {
  let sanitized = filename.replace(INVALID_FILENAME_CHARS, '_').replace(/^[\s.]+|[\s.]+$/g, '')
  if (!sanitized) return FALLBACK_FILENAME

  if (sanitized.length > MAX_FILENAME_LENGTH) {
    const ext = path.extname(sanitized)
    const name = sanitized.slice(0, sanitized.length - ext.length)
    sanitized = name.slice(0, MAX_FILENAME_LENGTH - ext.length) + ext
  }
  return sanitized
}
